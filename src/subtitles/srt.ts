import path from "node:path";
import { SUBTITLE_EXTENSION } from "../constants.js";
import type { AudioSegment } from "../types.js";

const EOL = "\n";

function pad2(n: number) {
  return n.toString().padStart(2, "0");
}
function pad3(n: number) {
  return n.toString().padStart(3, "0");
}

/**
 * `HH:MM:SS,mmm`; sub-millisecond precision is truncated. Hours are padded to
 * two digits and never wrap, so 100 hours renders as `100:00:00,000`.
 */
export function formatTimestamp(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const h = Math.floor(total / 3600000);
  const m = Math.floor((total % 3600000) / 60000);
  const s = Math.floor((total % 60000) / 1000);
  const msPart = total % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)},${pad3(msPart)}`;
}

export function formatSrt(segments: readonly AudioSegment[]): string {
  return segments
    .map(
      (s, i) =>
        `${i + 1}${EOL}${formatTimestamp(s.startMs)} --> ${formatTimestamp(s.endMs)}${EOL}${s.text}${EOL}${EOL}`
    )
    .join("");
}

// clip.mp4 -> clip.srt in the same directory
export function subtitlePathFor(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}${SUBTITLE_EXTENSION}`);
}
