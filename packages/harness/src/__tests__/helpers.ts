import { CapturingLogger, constantRandom, ManualClock } from "@asyncloop/test-utils";
import { createHarness, type TestHarness } from "../harness.js";

export interface HarnessFixture {
  readonly harness: TestHarness;
  readonly lines: string[];
  readonly logger: CapturingLogger;
  readonly clock: ManualClock;
}

/** Harness on virtual time, printing into an array */
export function makeHarness(): HarnessFixture {
  const lines: string[] = [];
  const logger = new CapturingLogger();
  const clock = new ManualClock();
  const harness = createHarness({
    logger,
    loopDefaults: { clock, random: constantRandom(0.5) },
    print: (line) => lines.push(line),
  });
  return { harness, lines, logger, clock };
}
