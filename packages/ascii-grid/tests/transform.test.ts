import { describe, expect, it } from "vitest";
import type { Affine } from "../src/transform.js";
import { applyGeoTransform, northUp } from "../src/transform.js";

describe("applyGeoTransform", () => {
  it("applies an identity-like transform", () => {
    const gt: Affine = [1, 0, 0, 0, 1, 0];
    expect(applyGeoTransform(3, 4, gt)).toEqual([3, 4]);
  });

  it("applies scale + translation", () => {
    const gt: Affine = [0.5, 0, 100, 0, -0.5, 200];
    expect(applyGeoTransform(10, 20, gt)).toEqual([105, 190]);
  });
});

describe("northUp", () => {
  it("puts the origin at the top-left corner", () => {
    const gt = northUp(390000, 346000, 2);
    expect(gt).toEqual([2, 0, 390000, 0, -2, 346000]);
    expect(applyGeoTransform(0, 0, gt)).toEqual([390000, 346000]);
    expect(applyGeoTransform(3, 5, gt)).toEqual([390006, 345990]);
  });
});
