import * as path from "path";

const FRAME_LOCATION = /\(?([^()\s]+):(\d+):\d+\)?$/;

/**
 * Returns `file:line` of a frame above the caller of `getCallSite`.
 * `skipFrames` 0 is the direct caller, 1 its caller, and so on.
 */
export function getCallSite(skipFrames = 0): string {
  const stack = new Error().stack ?? "";
  const frames = stack
    .split("\n")
    .slice(1)
    .map((line) => line.trim().match(FRAME_LOCATION))
    .filter((match): match is RegExpMatchArray => match !== null);

  // frames[0] is getCallSite itself
  const frame = frames[skipFrames + 1];
  if (!frame) {
    return "unknown";
  }

  return `${path.basename(frame[1])}:${frame[2]}`;
}
