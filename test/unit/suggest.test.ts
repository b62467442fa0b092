import { expect } from "chai";
import {
  editDistance,
  suggestMarkers,
  typoThreshold,
} from "../../src/core/suggest";

describe("editDistance", () => {
  it("counts insertions, deletions and substitutions", () => {
    expect(editDistance("kitten", "sitting")).to.equal(3);
    expect(editDistance("latest-deploy-prod", "last-deploy-prod")).to.equal(2);
    expect(editDistance("", "abc")).to.equal(3);
    expect(editDistance("abc", "abc")).to.equal(0);
  });

  it("stops at max + 1 once the bound is exceeded", () => {
    expect(editDistance("abcdef", "uvwxyz", 2)).to.equal(3);
    expect(editDistance("a", "abcdefgh", 3)).to.equal(4);
  });
});

describe("typoThreshold", () => {
  it("scales with the name and stays within 1..3", () => {
    expect(typoThreshold("v1")).to.equal(1);
    expect(typoThreshold("deploy")).to.equal(2);
    expect(typoThreshold("latest-deploy-prod")).to.equal(3);
  });
});

describe("suggestMarkers", () => {
  it("returns near misses nearest first and skips the exact name", () => {
    const got = suggestMarkers("last-deploy", [
      "last-deploy-prod",
      "last-deplyo",
      "last-depoy",
      "release-1",
      "last-deploy",
    ]);
    expect(got).to.deep.equal([
      { name: "last-depoy", distance: 1 },
      { name: "last-deplyo", distance: 2 },
    ]);
  });

  it("orders equal distances lexically", () => {
    expect(suggestMarkers("prod", ["prox", "prodd", "proa"])).to.deep.equal([
      { name: "proa", distance: 1 },
      { name: "prodd", distance: 1 },
      { name: "prox", distance: 1 },
    ]);
  });

  it("reports each name once", () => {
    expect(suggestMarkers("prod", ["prox", "prox"])).to.deep.equal([
      { name: "prox", distance: 1 },
    ]);
  });

  it("returns nothing when no name is close", () => {
    expect(suggestMarkers("last-deploy", ["v1.0.0", "staging"])).to.deep.equal(
      [],
    );
  });
});
