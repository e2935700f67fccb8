import { describe, expect, it } from "vitest";
import { validateMcq } from "./mcqValidator.js";

const valid = {
  question: "What is the capital of France?",
  options: ["Berlin", "Madrid", "Paris", "Rome"],
  answer: 2,
  explanation: "Paris is the capital.",
};

describe("validateMcq", () => {
  it("accepts a well-formed record", () => {
    expect(validateMcq(valid)).toEqual(valid);
  });

  it("defaults a missing explanation to an empty string", () => {
    const { explanation: _omit, ...withoutExplanation } = valid;
    expect(validateMcq(withoutExplanation)).toEqual({ ...withoutExplanation, explanation: "" });
  });

  it("treats a null explanation as empty", () => {
    expect(validateMcq({ ...valid, explanation: null })?.explanation).toBe("");
  });

  it("drops keys that are not part of an MCQ", () => {
    expect(validateMcq({ ...valid, difficulty: "easy" })).toEqual(valid);
  });

  it("rejects a record missing the answer", () => {
    const { answer: _omit, ...withoutAnswer } = valid;
    expect(validateMcq(withoutAnswer)).toBeNull();
  });

  it("rejects a record missing the question or options", () => {
    const { question: _q, ...withoutQuestion } = valid;
    const { options: _o, ...withoutOptions } = valid;
    expect(validateMcq(withoutQuestion)).toBeNull();
    expect(validateMcq(withoutOptions)).toBeNull();
  });

  it("rejects anything other than exactly four options", () => {
    expect(validateMcq({ ...valid, options: ["a", "b", "c"] })).toBeNull();
    expect(validateMcq({ ...valid, options: ["a", "b", "c", "d", "e"] })).toBeNull();
    expect(validateMcq({ ...valid, options: "a,b,c,d" })).toBeNull();
  });

  it("rejects non-string options", () => {
    expect(validateMcq({ ...valid, options: ["a", "b", 3, "d"] })).toBeNull();
  });

  it("rejects answers outside 0-3 or that are not integers", () => {
    expect(validateMcq({ ...valid, answer: 4 })).toBeNull();
    expect(validateMcq({ ...valid, answer: -1 })).toBeNull();
    expect(validateMcq({ ...valid, answer: 1.5 })).toBeNull();
    expect(validateMcq({ ...valid, answer: "2" })).toBeNull();
  });

  it("accepts every answer index from 0 to 3", () => {
    for (const answer of [0, 1, 2, 3]) {
      expect(validateMcq({ ...valid, answer })?.answer).toBe(answer);
    }
  });

  it("rejects a blank question", () => {
    expect(validateMcq({ ...valid, question: "   " })).toBeNull();
  });

  it("rejects values that are not objects", () => {
    expect(validateMcq(null)).toBeNull();
    expect(validateMcq("question")).toBeNull();
    expect(validateMcq([valid])).toBeNull();
  });
});
