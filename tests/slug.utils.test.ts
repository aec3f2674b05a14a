import { describe, it, expect } from "vitest";
import { normalizeForMatch, removeAccents } from "../src/utils/slug.utils";

describe("removeAccents", () => {
  it("strips diacritics", () => {
    expect(removeAccents("Canción Ñandú")).toBe("Cancion Nandu");
  });
});

describe("normalizeForMatch", () => {
  it("lowercases and collapses punctuation and whitespace", () => {
    expect(normalizeForMatch("  The BIG   Interview: Part 2!  ")).toBe(
      "the big interview part 2"
    );
  });

  it("joins words around apostrophes", () => {
    expect(normalizeForMatch("Don't Panic")).toBe("dont panic");
    expect(normalizeForMatch("Don’t Panic")).toBe("dont panic");
  });

  it("spells out ampersands", () => {
    expect(normalizeForMatch("Rock & Roll")).toBe("rock and roll");
    expect(normalizeForMatch("Rock&Roll")).toBe("rock and roll");
  });

  it("turns date separators into spaces", () => {
    expect(normalizeForMatch("Show - 2021-01-01 Episode Two")).toBe(
      "show 2021 01 01 episode two"
    );
  });

  it("keeps letters from non-Latin scripts", () => {
    expect(normalizeForMatch("Эпизод: Москва 2020")).toBe("эпизод москва 2020");
    expect(normalizeForMatch("第十話 東京")).toBe("第十話 東京");
  });

  it("gives an empty string for punctuation-only input", () => {
    expect(normalizeForMatch("?!...")).toBe("");
  });
});
