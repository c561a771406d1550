import { main } from "./index";
import { EXIT_FAILURE, error, formatError } from "./utils";

main().catch((err: unknown) => {
  error(formatError(err));
  process.exit(EXIT_FAILURE);
});
