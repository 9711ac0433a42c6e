import { describe, it, expect } from "vitest";
import { defaultTokenizerConfig } from "@charword/core";
import {
  BasicSegmenter,
  whitespaceTokenize,
  isCjkCodePoint,
  isControl,
  isPunctuation,
  isWhitespace,
  type SegmenterOptions,
} from "@charword/tokenizers";

const segmenter = (options: Partial<SegmenterOptions> = {}) =>
  new BasicSegmenter({ ...defaultTokenizerConfig, ...options });

describe("BasicSegmenter", () => {
  it("isolates CJK ideographs", () => {
    expect(segmenter().segment("a中b")).toEqual(["a", "中", "b"]);
  });

  it("leaves CJK runs alone when isolation is off", () => {
    expect(segmenter({ tokenizeChineseChars: false }).segment("a中b")).toEqual(["a中b"]);
  });

  it("splits punctuation into single-character tokens", () => {
    expect(segmenter().segment("don't stop")).toEqual(["don", "'", "t", "stop"]);
  });

  it("keeps punctuation attached when splitting is off", () => {
    expect(segmenter({ doSplitOnPunc: false }).segment("don't stop")).toEqual(["don't", "stop"]);
  });

  it("treats ASCII symbols as punctuation", () => {
    expect(segmenter().segment("$5+3")).toEqual(["$", "5", "+", "3"]);
  });

  it("lowercases and strips accents by default", () => {
    expect(segmenter().segment("Héllo Wörld")).toEqual(["hello", "world"]);
  });

  it("keeps accents when lowercasing with stripAccents=false", () => {
    expect(segmenter({ stripAccents: false }).segment("Héllo")).toEqual(["héllo"]);
  });

  it("keeps case and accents when lowercasing is off", () => {
    expect(segmenter({ doLowerCase: false }).segment("Héllo")).toEqual(["Héllo"]);
  });

  it("strips accents without lowercasing when asked", () => {
    expect(segmenter({ doLowerCase: false, stripAccents: true }).segment("Héllo")).toEqual(["Hello"]);
  });

  it("composes decomposed characters", () => {
    expect(segmenter({ doLowerCase: false }).segment("e\u0301")).toEqual(["\u00e9"]);
  });

  it("drops control characters and maps whitespace to spaces", () => {
    expect(segmenter().segment("a\u0000b\tc")).toEqual(["ab", "c"]);
    expect(segmenter().segment("x\u00a0y")).toEqual(["x", "y"]);
    expect(segmenter().segment("p\u200bq\ufffdr")).toEqual(["pqr"]);
  });

  it("returns nothing for blank input", () => {
    expect(segmenter().segment("")).toEqual([]);
    expect(segmenter().segment(" \t\n ")).toEqual([]);
  });

  it("never splits protected tokens", () => {
    expect(segmenter().segment("Hello [CLS] world", ["[CLS]"])).toEqual(["hello", "[CLS]", "world"]);
    expect(segmenter().segment("Hello [CLS] world")).toEqual(["hello", "[", "cls", "]", "world"]);
  });

  it("honours the configured neverSplit set", () => {
    expect(segmenter({ neverSplit: ["C++"] }).segment("C++ rocks")).toEqual(["C++", "rocks"]);
  });

  it("is idempotent on its own output", () => {
    const seg = segmenter();
    const first = seg.segment("Héllo, World! 你好 don't");
    expect(first).toEqual(["hello", ",", "world", "!", "你", "好", "don", "'", "t"]);
    expect(seg.segment(first.join(" "))).toEqual(first);
  });
});

describe("whitespaceTokenize", () => {
  it("splits on runs of whitespace", () => {
    expect(whitespaceTokenize("  a  b\n c ")).toEqual(["a", "b", "c"]);
    expect(whitespaceTokenize("   ")).toEqual([]);
  });
});

describe("character classes", () => {
  it("classifies whitespace", () => {
    expect(isWhitespace("\t")).toBe(true);
    expect(isWhitespace("\u3000")).toBe(true);
    expect(isWhitespace("a")).toBe(false);
  });

  it("classifies control characters", () => {
    expect(isControl("\n")).toBe(false);
    expect(isControl("\u0007")).toBe(true);
    expect(isControl("a")).toBe(false);
  });

  it("classifies punctuation", () => {
    expect(isPunctuation("'")).toBe(true);
    expect(isPunctuation("`")).toBe(true);
    expect(isPunctuation("、")).toBe(true);
    expect(isPunctuation("a")).toBe(false);
  });

  it("recognises CJK ideographs only", () => {
    expect(isCjkCodePoint(0x4e2d)).toBe(true);
    expect(isCjkCodePoint(0x20001)).toBe(true);
    expect(isCjkCodePoint(0x3042)).toBe(false);
    expect(isCjkCodePoint(0xac00)).toBe(false);
  });
});
