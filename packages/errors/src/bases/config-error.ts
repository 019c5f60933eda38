import { ParleyError } from "../base.js";

/**
 * Construction-time configuration rejected by schema validation.
 * `issues` holds one `path: message` line per violation.
 */
export class ConfigValidationError extends ParleyError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONFIG_INVALID" as const;
  readonly issues: readonly string[];

  constructor(subject: string, issues: readonly string[]) {
    super(`Invalid ${subject} configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
