import { CheckFailedError } from "@asyncloop/errors";
import type { EventLoop } from "@asyncloop/event-loop";
import type { AsyncTestContext, TestContext } from "./types.js";

export class SyncTestContext implements TestContext {
  constructor(
    readonly group: string,
    readonly name: string,
  ) {}

  check(condition: unknown, message = "condition is false"): void {
    if (!condition) {
      throw new CheckFailedError(message);
    }
  }
}

export class LoopTestContext extends SyncTestContext implements AsyncTestContext {
  constructor(
    group: string,
    name: string,
    readonly loop: EventLoop,
  ) {
    super(group, name);
  }

  done(tag?: string): void {
    this.loop.done(tag);
  }

  error(message: string): void;
  error(tag: string, message: string): void;
  error(tagOrMessage: string, message?: string): void {
    if (message === undefined) {
      this.loop.error(tagOrMessage);
    } else {
      this.loop.error(tagOrMessage, message);
    }
  }
}
