export {
  BUILTIN_CHECKS,
  defineCheck,
  isPeerEstablished,
  type CheckDefinition,
  type CheckVerdict,
  type ValidationCheck,
} from "./checks.js";
export { countValidation, DEFAULT_PHASE_CHECKS, ValidationRunner, type ValidationCounts, type ValidationRunnerOptions } from "./runner.js";
