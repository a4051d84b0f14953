import type { ErrorRecord } from "../common/diagnostics.js";
import type { Position } from "../common/span.js";

export class RuntimeError extends Error implements ErrorRecord {
  constructor(
    message: string,
    readonly position?: Position
  ) {
    super(message);
    this.name = "RuntimeError";
  }
}
