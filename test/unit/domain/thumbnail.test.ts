// ---------------------------------------------------------------------------
// Tests for thumbnail selection.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import type { ParsedManifest } from "../../../src/domain/manifest/parse-manifest.js";
import {
  imageIdentifier,
  imageServiceThumbnail,
  manifestIdentifier,
  selectThumbnail,
} from "../../../src/domain/manifest/thumbnail.js";

function manifest(overrides: Partial<ParsedManifest> = {}): ParsedManifest {
  return {
    version: 2,
    id: "https://iiif.example.org/iiif/MS-ADD-01234/manifest.json",
    label: null,
    metadata: [],
    thumbnail: null,
    canvases: [],
    ...overrides,
  };
}

describe("identifiers", () => {
  it("reads the manifest identifier from common URL shapes", () => {
    expect(manifestIdentifier("https://iiif.example.org/MS-ADD-01234/manifest.json")).toBe(
      "MS-ADD-01234",
    );
    expect(manifestIdentifier("https://iiif.example.org/bx123cd4567/iiif/manifest")).toBe(
      "bx123cd4567",
    );
    expect(manifestIdentifier("https://iiif.example.org/manifests/abc-123.json")).toBe("abc-123");
  });

  it("reads the image identifier before the IIIF image suffix", () => {
    expect(imageIdentifier("https://img.example.org/iiif/page-7/full/200,/0/default.jpg")).toBe(
      "page-7",
    );
    expect(imageIdentifier("https://img.example.org/files/page-7.jpg")).toBe("page-7");
  });

  it("keeps a segment whose percent-escapes are malformed", () => {
    expect(manifestIdentifier("https://iiif.example.org/100%/manifest")).toBe("100%");
    expect(manifestIdentifier("https://iiif.example.org/ms%20a/manifest")).toBe("ms a");
    expect(imageIdentifier("https://img.example.org/iiif/p%zz/full/200,/0/default.jpg")).toBe("p%zz");
  });

  it("builds an image service request", () => {
    expect(imageServiceThumbnail("https://img.example.org/iiif/page-7/")).toBe(
      "https://img.example.org/iiif/page-7/full/200,/0/default.jpg",
    );
  });
});

describe("selectThumbnail", () => {
  it("prefers the manifest's own thumbnail", () => {
    const chosen = selectThumbnail(
      manifest({
        thumbnail: "https://img.example.org/thumbs/cover.jpg",
        canvases: [
          { id: "c1", thumbnail: null, imageService: "https://img.example.org/iiif/p1", image: null },
        ],
      }),
    );
    expect(chosen).toBe("https://img.example.org/thumbs/cover.jpg");
  });

  it("rejects a thumbnail built from the manifest identifier", () => {
    const chosen = selectThumbnail(
      manifest({
        thumbnail: "https://img.example.org/iiif/MS-ADD-01234/full/200,/0/default.jpg",
        canvases: [
          {
            id: "c1",
            thumbnail: null,
            imageService: "https://img.example.org/iiif/MS-ADD-01234-000-00001.jp2",
            image: null,
          },
        ],
      }),
    );
    expect(chosen).toBe(
      "https://img.example.org/iiif/MS-ADD-01234-000-00001.jp2/full/200,/0/default.jpg",
    );
  });

  it("falls back to the first canvas image", () => {
    const chosen = selectThumbnail(
      manifest({
        canvases: [
          { id: "c1", thumbnail: null, imageService: null, image: "https://img.example.org/p1.jpg" },
        ],
      }),
    );
    expect(chosen).toBe("https://img.example.org/p1.jpg");
  });

  it("returns null when nothing usable exists", () => {
    expect(selectThumbnail(manifest())).toBeNull();
  });
});
