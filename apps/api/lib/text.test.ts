import { describe, expect, it } from "vitest";
import {
  audioFileNameFor,
  capitalizeTerm,
  detectInputKind,
  normalizeTerms,
  stripLeadingArticle
} from "./text";

describe("text helpers", () => {
  it("splits input into trimmed, non-empty terms", () => {
    expect(normalizeTerms("\uFEFFTisch\r\n\n  guten   Morgen  \n   \nIch gehe ins Kino.\n")).toEqual([
      "Tisch",
      "guten Morgen",
      "Ich gehe ins Kino."
    ]);
  });

  it("normalizes a list of terms and keeps duplicates in order", () => {
    expect(normalizeTerms([" Hund ", "", "Hund"])).toEqual(["Hund", "Hund"]);
  });

  it("capitalizes the first letter and lowercases the rest", () => {
    expect(capitalizeTerm("tISCH")).toBe("Tisch");
    expect(capitalizeTerm("ä")).toBe("Ä");
    expect(capitalizeTerm("")).toBe("");
  });

  it("strips an article that repeats the gender", () => {
    expect(stripLeadingArticle("Der schreibtisch", "der")).toBe("Schreibtisch");
    expect(stripLeadingArticle("Tisch", "der")).toBe("Tisch");
    expect(stripLeadingArticle("Derwisch", "der")).toBe("Derwisch");
    expect(stripLeadingArticle("Die Katze", undefined)).toBe("Die Katze");
  });

  it("detects the input kind from punctuation and token count", () => {
    expect(detectInputKind("Tisch")).toBe("word");
    expect(detectInputKind("ins Blaue")).toBe("expression");
    expect(detectInputKind("Ich gehe ins Kino.")).toBe("sentence");
    expect(detectInputKind("Wirklich?")).toBe("sentence");
  });

  it("derives file-safe audio names", () => {
    expect(audioFileNameFor("Tisch")).toBe("tisch_pronunciation.mp3");
    expect(audioFileNameFor("der Tisch")).toBe("der_tisch_pronunciation.mp3");
    expect(audioFileNameFor("Wie geht's? Gut/schlecht")).toBe("wie_geht's_gutschlecht_pronunciation.mp3");
  });

  it("caps long audio names by byte length and keeps them distinct", () => {
    const long = `${"Wenn ich morgen früh aufwache ".repeat(10)}gehe ich ins Kino.`;
    const name = audioFileNameFor(long);

    expect(Buffer.byteLength(name, "utf8")).toBeLessThanOrEqual(138);
    expect(name).toMatch(/^wenn_ich_morgen_früh_aufwache_[a-zäöü_]*_[0-9a-f]{8}_pronunciation\.mp3$/);
    expect(audioFileNameFor(long)).toBe(name);
    expect(audioFileNameFor(`${long} Danach schlafe ich.`)).not.toBe(name);
  });
});
