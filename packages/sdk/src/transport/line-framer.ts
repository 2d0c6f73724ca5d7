import { StringDecoder } from "node:string_decoder";

export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

export type FramerOutput =
  | { kind: "frame"; text: string }
  | { kind: "error"; message: string };

/**
 * Reassembles newline-delimited frames from arbitrary chunk boundaries,
 * including multi-byte characters split across chunks.
 */
export class LineFramer {
  private readonly decoder = new StringDecoder("utf8");
  private buffer = "";
  private discarding = false;

  constructor(private readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {}

  push(chunk: Buffer | string): FramerOutput[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.write(chunk);
    const out: FramerOutput[] = [];
    let start = 0;

    for (let index = text.indexOf("\n"); index !== -1; index = text.indexOf("\n", start)) {
      const piece = text.slice(start, index);
      start = index + 1;
      if (this.discarding) {
        this.discarding = false;
        this.buffer = "";
        continue;
      }
      const line = stripCarriageReturn(this.buffer + piece);
      this.buffer = "";
      if (line.trim().length === 0) {
        continue;
      }
      if (Buffer.byteLength(line, "utf8") > this.maxFrameBytes) {
        out.push({ kind: "error", message: `Frame exceeds ${this.maxFrameBytes} bytes` });
        continue;
      }
      out.push({ kind: "frame", text: line });
    }

    const rest = text.slice(start);
    if (this.discarding) {
      return out;
    }
    this.buffer += rest;
    if (Buffer.byteLength(this.buffer, "utf8") > this.maxFrameBytes) {
      this.buffer = "";
      this.discarding = true;
      out.push({ kind: "error", message: `Frame exceeds ${this.maxFrameBytes} bytes` });
    }
    return out;
  }

  /** Called once the input ends. A trailing unterminated frame is incomplete. */
  finish(): FramerOutput[] {
    const rest = this.buffer + this.decoder.end();
    this.buffer = "";
    this.discarding = false;
    if (rest.trim().length === 0) {
      return [];
    }
    return [{ kind: "error", message: `Stream ended inside an incomplete frame (${rest.length} chars)` }];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
