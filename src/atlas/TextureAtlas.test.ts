import { describe, it, expect } from "vitest";
import { TextureAtlas } from "./TextureAtlas";

describe("TextureAtlas", () => {
  describe("constructor", () => {
    it("allocates RGBA8 storage for every layer", () => {
      const atlas = new TextureAtlas({ width: 4, height: 2, layers: 3 });

      expect(atlas.data.length).toBe(4 * 2 * 3 * 4);
      expect(atlas.layers).toBe(3);
    });

    it("defaults to a single layer", () => {
      expect(new TextureAtlas({ width: 1, height: 1 }).layers).toBe(1);
    });

    it("rejects empty sizes", () => {
      expect(() => new TextureAtlas({ width: 0, height: 4 })).toThrow(RangeError);
      expect(() => new TextureAtlas({ width: 4, height: 4, layers: 0 })).toThrow(RangeError);
    });
  });

  describe("texels", () => {
    it("stores colors as bytes", () => {
      const atlas = new TextureAtlas({ width: 2, height: 2 });
      atlas.setTexel(0, 1, 1, [1, 0.5, 0, 1]);

      expect(Array.from(atlas.data.subarray(12, 16))).toEqual([255, 128, 0, 255]);
      expect(atlas.texel(0, 1, 1)).toEqual([1, 128 / 255, 0, 1]);
    });

    it("clamps reads to the edge", () => {
      const atlas = new TextureAtlas({ width: 2, height: 2 });
      atlas.setTexel(0, 0, 0, [1, 1, 1, 1]);

      expect(atlas.texel(0, -5, -5)).toEqual([1, 1, 1, 1]);
    });

    it("rejects writes outside the atlas", () => {
      const atlas = new TextureAtlas({ width: 2, height: 2 });

      expect(() => atlas.setTexel(0, 2, 0, [1, 1, 1, 1])).toThrow(RangeError);
      expect(() => atlas.setTexel(1, 0, 0, [1, 1, 1, 1])).toThrow(RangeError);
    });

    it("replaces whole layers", () => {
      const atlas = new TextureAtlas({ width: 1, height: 1, layers: 2 });
      atlas.setLayer(1, [10, 20, 30, 40]);

      expect(Array.from(atlas.data)).toEqual([0, 0, 0, 0, 10, 20, 30, 40]);
      expect(() => atlas.setLayer(0, [1, 2, 3])).toThrow("Layer data must be 4 bytes, got 3");
    });
  });

  describe("sample", () => {
    function checker(): TextureAtlas {
      const atlas = new TextureAtlas({ width: 2, height: 2 });
      atlas.setTexel(0, 0, 0, [1, 1, 1, 1]);
      return atlas;
    }

    it("returns the texel at its center", () => {
      expect(checker().sample(0, 0.25, 0.25)).toEqual([1, 1, 1, 1]);
      expect(checker().sample(0, 0.75, 0.75)).toEqual([0, 0, 0, 0]);
    });

    it("interpolates between texel centers", () => {
      expect(checker().sample(0, 0.5, 0.25)).toEqual([0.5, 0.5, 0.5, 0.5]);
    });

    it("clamps outside the unit square", () => {
      expect(checker().sample(0, 0, 0)).toEqual([1, 1, 1, 1]);
    });
  });
});
