import Bottleneck from "bottleneck";
import { logger } from "../logger";

/**
 * One outbound request at a time, spaced at least `minTimeMs` apart.
 * The spacing runs from the start of one call to the start of the next, so a
 * call that itself takes longer than `minTimeMs` leaves no extra pause after it.
 * Nominatim accepts at most one request per second.
 */
export function createRequestLimiter(minTimeMs: number): Bottleneck {
  const limiter = new Bottleneck({
    maxConcurrent: 1,
    minTime: minTimeMs,
  });

  limiter.on("queued", () => {
    logger.debug({ minTimeMs }, "Request queued by rate limiter");
  });

  return limiter;
}
