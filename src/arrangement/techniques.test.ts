import { describe, it, expect } from "vitest";
import { TECHNIQUES, hasTechnique, techniqueMask, techniqueNames } from "./techniques.js";

describe("techniques", () => {
  it("combines names into a mask", () => {
    expect(techniqueMask("slide", "mute")).toBe(TECHNIQUES.slide | TECHNIQUES.mute);
    expect(techniqueMask()).toBe(0);
  });

  it("lists set bits in bit order", () => {
    expect(techniqueNames(TECHNIQUES.hammerOn | TECHNIQUES.bend)).toEqual(["bend", "hammerOn"]);
    expect(techniqueNames(0)).toEqual([]);
  });

  it("tests single bits", () => {
    const mask = techniqueMask("palmMute");
    expect(hasTechnique(mask, "palmMute")).toBe(true);
    expect(hasTechnique(mask, "mute")).toBe(false);
  });
});
