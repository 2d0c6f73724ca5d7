import { describe, expect, test } from "vitest";
import { LineFramer } from "./line-framer.js";

describe("LineFramer", () => {
  test("emits only complete lines and buffers the remainder", () => {
    const framer = new LineFramer();
    expect(framer.push('{"a":')).toEqual([]);
    expect(framer.push('1}\n{"b"')).toEqual([{ kind: "frame", text: '{"a":1}' }]);
    expect(framer.push(":2}\n")).toEqual([{ kind: "frame", text: '{"b":2}' }]);
  });

  test("splits several frames from one chunk and skips blank lines", () => {
    const framer = new LineFramer();
    expect(framer.push("one\n\n  \ntwo\r\nthree\n")).toEqual([
      { kind: "frame", text: "one" },
      { kind: "frame", text: "two" },
      { kind: "frame", text: "three" },
    ]);
  });

  test("reassembles multi-byte characters split across chunks", () => {
    const framer = new LineFramer();
    const bytes = Buffer.from("héllo\n", "utf8");
    expect(framer.push(bytes.subarray(0, 2))).toEqual([]);
    expect(framer.push(bytes.subarray(2))).toEqual([{ kind: "frame", text: "héllo" }]);
  });

  test("reports an oversize frame once and resumes after its newline", () => {
    const framer = new LineFramer(8);
    expect(framer.push("0123456789")).toEqual([{ kind: "error", message: "Frame exceeds 8 bytes" }]);
    expect(framer.push("more")).toEqual([]);
    expect(framer.push("tail\nok\n")).toEqual([{ kind: "frame", text: "ok" }]);
  });

  test("reports an oversize line that arrives whole", () => {
    const framer = new LineFramer(4);
    expect(framer.push("abcdef\nab\n")).toEqual([
      { kind: "error", message: "Frame exceeds 4 bytes" },
      { kind: "frame", text: "ab" },
    ]);
  });

  test("flags a trailing unterminated frame at end of input", () => {
    const framer = new LineFramer();
    framer.push('{"partial":');
    expect(framer.finish()).toEqual([
      { kind: "error", message: "Stream ended inside an incomplete frame (11 chars)" },
    ]);
    expect(framer.finish()).toEqual([]);
  });
});
