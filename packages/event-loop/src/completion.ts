/**
 * Single-writer completion state machine.
 *
 * not_complete → success | error | aborted, exactly once. Every later
 * transition request is refused and reported as `false`.
 */

import type { AsyncLoopError } from "@asyncloop/errors";
import type { CompletionState } from "./types.js";

export class CompletionStateMachine {
  private _state: CompletionState = "not_complete";
  private _error: AsyncLoopError | undefined;

  get state(): CompletionState {
    return this._state;
  }

  /** The error recorded by the transition to `error` */
  get error(): AsyncLoopError | undefined {
    return this._error;
  }

  get isTerminal(): boolean {
    return this._state !== "not_complete";
  }

  succeed(): boolean {
    return this.transition("success");
  }

  fail(error: AsyncLoopError): boolean {
    if (!this.transition("error")) return false;
    this._error = error;
    return true;
  }

  abort(): boolean {
    return this.transition("aborted");
  }

  private transition(next: Exclude<CompletionState, "not_complete">): boolean {
    if (this._state !== "not_complete") return false;
    this._state = next;
    return true;
  }
}
