export {
  colors,
  dim,
  error,
  header,
  info,
  print,
  success,
  warning,
} from "./output";
export { EXIT_FAILURE, ProfileNotFoundError, formatError } from "./errors";
