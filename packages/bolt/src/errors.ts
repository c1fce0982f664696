/**
 * Bolt Backend Errors
 */

import { HarnessError } from "@graphcheck/harness"

/**
 * Connection error.
 * Thrown when the driver cannot be loaded or the server cannot be reached.
 */
export class BoltConnectionError extends HarnessError {
  constructor(
    message: string,
    public readonly uri: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "BoltConnectionError"
  }
}

/**
 * Result error.
 * Thrown when a query returns something other than the node or relationship expected.
 */
export class UnexpectedResultError extends HarnessError {
  constructor(
    public readonly expected: "node" | "relationship",
    public readonly query: string,
  ) {
    super(`Expected a ${expected} from: ${query}`)
    this.name = "UnexpectedResultError"
  }
}
