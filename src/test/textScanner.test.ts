import { describe, expect, it } from "vitest";
import {
  byteIndexFromCharIndex,
  charIndexFromByteIndex,
  countInText,
  extractAll,
  extractValidOnly,
  extractWithCountryHint,
  redact,
  replaceInText,
} from "../textScanner";

function sliceBytes(text: string, start: number, end: number): string {
  return Buffer.from(text, "utf8").subarray(start, end).toString("utf8");
}

describe("extractAll", () => {
  it("finds international numbers with their byte spans", () => {
    const numbers = extractAll("Call me at +12025550173 or +442079460958");
    expect(numbers).toEqual([
      { raw: "+12025550173", normalized: "+12025550173", start: 11, end: 23, isValid: true },
      { raw: "+442079460958", normalized: "+442079460958", start: 27, end: 40, isValid: true },
    ]);
  });

  it("reports byte offsets, not character offsets, after multi-byte text", () => {
    const text = "Téléphone : +33 6 45 34 25 45 ✓";
    const [number] = extractAll(text);
    expect(number).toEqual({
      raw: "+33 6 45 34 25 45",
      normalized: "+33645342545",
      start: 14,
      end: 31,
      isValid: true,
    });
    expect(sliceBytes(text, number.start, number.end)).toBe(number.raw);
  });

  it("handles characters outside the basic multilingual plane", () => {
    const text = "📞 2025550173";
    const [number] = extractAll(text);
    expect(number.start).toBe(5);
    expect(number.end).toBe(15);
    expect(sliceBytes(text, number.start, number.end)).toBe("2025550173");
  });

  it("does not start inside an alphanumeric token", () => {
    expect(extractAll("Order AB12345678 shipped")).toEqual([]);
    expect(extractAll("ref x2025550173")).toEqual([]);
    expect(extractAll("é2025550173")).toEqual([]);
    // vowel sign i (U+093F) is a combining mark, alphabetic but not a letter
    expect(extractAll("कि2025550173")).toEqual([]);
  });

  it("ignores runs of fewer than seven digits", () => {
    expect(extractAll("Room 12-34 at 5pm")).toEqual([]);
  });

  it("keeps spans that look like numbers but do not validate", () => {
    const numbers = extractAll("Call 555-1234 now");
    expect(numbers).toEqual([{ raw: "555-1234", normalized: null, start: 5, end: 13, isValid: false }]);
  });

  it("does not absorb trailing punctuation", () => {
    const [number] = extractAll("Call 202-555-0173.");
    expect(number.raw).toBe("202-555-0173");
    expect(number.end).toBe(17);
  });

  it("accepts an opening parenthesis as a start", () => {
    const [number] = extractAll("(202) 555-0173, thanks");
    expect(number.raw).toBe("(202) 555-0173");
    expect(number.start).toBe(0);
  });

  it("does not join numbers separated by spaced punctuation", () => {
    const numbers = extractAll("Numbers 2025550173 - 2025550174");
    expect(numbers.map((n) => n.raw)).toEqual(["2025550173", "2025550174"]);
  });

  it("stops once a span passes fifteen digits", () => {
    const numbers = extractAll("1234567890123456789");
    expect(numbers).toHaveLength(1);
    expect(numbers[0].raw).toBe("1234567890123456");
    expect(numbers[0].start).toBe(0);
    expect(numbers[0].end).toBe(16);
  });

  it("returns ordered, non-overlapping spans inside the text", () => {
    const text = "ñ +12025550173, (202) 555-0173; 0044 20 7946 0958 · fin 07123 456789";
    const bytes = Buffer.byteLength(text, "utf8");
    const numbers = extractAll(text);
    expect(numbers.length).toBe(4);
    let previousEnd = 0;
    for (const n of numbers) {
      expect(n.start).toBeGreaterThanOrEqual(previousEnd);
      expect(n.end).toBeGreaterThan(n.start);
      expect(n.end).toBeLessThanOrEqual(bytes);
      expect(sliceBytes(text, n.start, n.end)).toBe(n.raw);
      expect(n.raw.replace(/\D/g, "").length).toBeGreaterThanOrEqual(7);
      previousEnd = n.end;
    }
  });

  it("reads dotted numbers but does not validate them", () => {
    const [number] = extractAll("202.555.0173");
    expect(number.raw).toBe("202.555.0173");
    expect(number.isValid).toBe(false);
  });
});

describe("extractValidOnly", () => {
  it("drops spans that do not validate", () => {
    const numbers = extractValidOnly("Call +12025550173 or 555-1234");
    expect(numbers.map((n) => n.normalized)).toEqual(["+12025550173"]);
  });
});

describe("extractWithCountryHint", () => {
  it("reads national numbers as belonging to the hinted country", () => {
    expect(extractWithCountryHint("0645342545", "FR")).toEqual([
      { raw: "0645342545", normalized: "+33645342545", start: 0, end: 10, isValid: true },
    ]);
  });

  it("prefers the hint over a coincidental prefix match", () => {
    expect(extractAll("📞 2025550173")[0].normalized).toBe("+2025550173");
    expect(extractWithCountryHint("📞 2025550173", "US")[0].normalized).toBe("+12025550173");
  });

  it("applies the hint before an international 00 prefix", () => {
    expect(extractAll("0033 6 45 34 25 45")[0].normalized).toBe("+33645342545");
    expect(extractWithCountryHint("0033 6 45 34 25 45", "AT")).toEqual([
      { raw: "0033 6 45 34 25 45", normalized: "+4333645342545", start: 0, end: 18, isValid: true },
    ]);
    expect(extractWithCountryHint("0033 6 45 34 25 45", "FR")[0].normalized).toBe("+33645342545");
  });

  it("validates dotted numbers through the hint", () => {
    expect(extractWithCountryHint("202.555.0173", "US")[0].normalized).toBe("+12025550173");
  });

  it("reads numbers with a plus sign as written", () => {
    expect(extractWithCountryHint("+442079460958", "US")[0].normalized).toBe("+442079460958");
  });

  it("ignores an unknown country", () => {
    expect(extractWithCountryHint("0645342545", "ZZ")).toEqual([
      { raw: "0645342545", normalized: null, start: 0, end: 10, isValid: false },
    ]);
  });
});

describe("countInText", () => {
  it("counts every span", () => {
    expect(countInText("Call me at +12025550173 or +442079460958")).toBe(2);
    expect(countInText("nothing here")).toBe(0);
  });
});

describe("replaceInText", () => {
  it("splices replacements into the original text", () => {
    expect(replaceInText("Call me at +12025550173 or +442079460958", () => "[REDACTED]")).toBe(
      "Call me at [REDACTED] or [REDACTED]",
    );
  });

  it("keeps multi-byte text around the spans intact", () => {
    expect(replaceInText("Téléphone : +33 6 45 34 25 45 ✓", (n) => n.normalized ?? n.raw)).toBe(
      "Téléphone : +33645342545 ✓",
    );
  });

  it("returns the text unchanged when nothing matches", () => {
    expect(replaceInText("no numbers", () => "x")).toBe("no numbers");
  });
});

describe("redact", () => {
  it("uses a placeholder by default", () => {
    expect(redact("Call +12025550173")).toBe("Call [PHONE]");
  });

  it("keeps trailing digits visible", () => {
    expect(redact("Call +12025550173", { visibleDigits: 4 })).toBe("Call *******0173");
    expect(redact("Call +12025550173", { visibleDigits: 2, maskChar: "#" })).toBe("Call #########73");
  });

  it("uses the placeholder when every digit would be visible", () => {
    expect(redact("Call +12025550173", { visibleDigits: 11 })).toBe("Call [PHONE]");
    expect(redact("Call +12025550173", { visibleDigits: 20, placeholder: "<number>" })).toBe("Call <number>");
  });
});

describe("index conversion", () => {
  it("maps character indexes to UTF-8 byte offsets", () => {
    expect(byteIndexFromCharIndex("héllo", 2)).toBe(3);
    expect(byteIndexFromCharIndex("a📞b", 2)).toBe(5);
    expect(byteIndexFromCharIndex("abc", 10)).toBe(3);
  });

  it("maps byte offsets back to character indexes", () => {
    expect(charIndexFromByteIndex("héllo", 3)).toBe(2);
    expect(charIndexFromByteIndex("a📞b", 5)).toBe(2);
  });
});
