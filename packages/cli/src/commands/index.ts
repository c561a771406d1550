export { configureApplyCommand, runApply, type ApplyOptions, type ApplyResult } from "./apply";
export { configureProfilesCommand, describeProfile } from "./profiles";
export { configureTrimCommand, trimHandler, type TrimOptions, type TrimOutcome } from "./trim";
