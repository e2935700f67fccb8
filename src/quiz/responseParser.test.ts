import { describe, expect, it } from "vitest";
import {
  extractJsonArray,
  parseBracketedSpan,
  parseFencedBlock,
  parseWholeReply,
  type ExtractionStrategy,
} from "./responseParser.js";

describe("extractJsonArray", () => {
  it("parses a bare JSON array", () => {
    expect(extractJsonArray('[{"x":1},{"y":2}]')).toEqual([{ x: 1 }, { y: 2 }]);
  });

  it("parses the array inside a json fenced block surrounded by prose", () => {
    expect(extractJsonArray('prefix ```json\n[{"a":1}]\n``` suffix')).toEqual([{ a: 1 }]);
  });

  it("parses an untagged fenced block", () => {
    expect(extractJsonArray('Here you go:\n```\n[1, 2]\n```')).toEqual([1, 2]);
  });

  it("falls back to the bracketed span when there is no fence", () => {
    const reply = 'Sure! Here are the questions:\n[{"question": "Q?"}]\nHope this helps.';
    expect(extractJsonArray(reply)).toEqual([{ question: "Q?" }]);
  });

  it("returns an empty list when no array can be recovered", () => {
    expect(extractJsonArray("no json here")).toEqual([]);
    expect(extractJsonArray("[not, valid json]")).toEqual([]);
    expect(extractJsonArray("")).toEqual([]);
  });

  it("does not accept a top-level object", () => {
    expect(extractJsonArray('{"question": "Q?"}')).toEqual([]);
  });

  it("keeps an empty array as a successful parse", () => {
    expect(extractJsonArray("[]")).toEqual([]);
  });

  it("stops at the first strategy that succeeds", () => {
    const calls: string[] = [];
    const record = (name: string, result: unknown[] | null): ExtractionStrategy => () => {
      calls.push(name);
      return result;
    };

    const result = extractJsonArray("ignored", [
      record("first", null),
      record("second", ["hit"]),
      record("third", ["never"]),
    ]);

    expect(result).toEqual(["hit"]);
    expect(calls).toEqual(["first", "second"]);
  });
});

describe("extraction strategies", () => {
  it("parseWholeReply rejects text around the array", () => {
    expect(parseWholeReply("x [1]")).toBeNull();
    expect(parseWholeReply(" [1] ")).toEqual([1]);
  });

  it("parseFencedBlock ignores fences without an array", () => {
    expect(parseFencedBlock('```json\n{"a":1}\n```')).toBeNull();
  });

  it("parseBracketedSpan is greedy across lines", () => {
    expect(parseBracketedSpan('a [1,\n2] b [3] c')).toBeNull();
    expect(parseBracketedSpan('a [[1],\n[2]] b')).toEqual([[1], [2]]);
  });
});
