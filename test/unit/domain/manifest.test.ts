// ---------------------------------------------------------------------------
// Tests for IIIF manifest parsing, metadata mapping and normalization.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { collapseText, stripHtml } from "../../../src/domain/manifest/language-map.js";
import {
  DEFAULT_SYNONYMS,
  mapMetadata,
  mergeSynonyms,
} from "../../../src/domain/manifest/metadata-synonyms.js";
import {
  CONTENTS_MAX_LENGTH,
  normalizeManifest,
  truncate,
} from "../../../src/domain/manifest/normalize-manifest.js";
import { parseManifest } from "../../../src/domain/manifest/parse-manifest.js";
import { v2Manifest } from "../../helpers/fixtures.js";

// ── Helpers ───────────────────────────────────────────────────────────────

function v3Manifest(): Record<string, unknown> {
  return {
    "@context": "http://iiif.io/api/presentation/3/context.json",
    id: "https://iiif.example.org/ms-049/manifest",
    type: "Manifest",
    label: { en: ["Cambridge, Corpus Christi College, MS 049: Bible"] },
    metadata: [
      { label: { en: ["Shelfmark"] }, value: { none: ["MS 049"] } },
      { label: { en: ["Date"] }, value: { en: ["12th century"] } },
      { label: { en: ["Language"] }, value: { en: ["Latin"] } },
    ],
    items: [
      {
        id: "https://iiif.example.org/ms-049/canvas/1",
        type: "Canvas",
        items: [
          {
            type: "AnnotationPage",
            items: [
              {
                type: "Annotation",
                body: {
                  id: "https://images.example.org/ms-049-001/full/max/0/default.jpg",
                  type: "Image",
                  service: [{ id: "https://images.example.org/ms-049-001", type: "ImageService3" }],
                },
              },
            ],
          },
        ],
      },
    ],
  };
}

// ── Text values ───────────────────────────────────────────────────────────

describe("collapseText", () => {
  it("reads plain strings, value objects and language maps", () => {
    expect(collapseText("Psalter")).toBe("Psalter");
    expect(collapseText({ "@value": "Hours" })).toBe("Hours");
    expect(collapseText({ en: ["Gospels"] })).toBe("Gospels");
  });

  it("keeps the first text or joins all of them", () => {
    const value = { en: ["Latin", "French"] };
    expect(collapseText(value, "first")).toBe("Latin");
    expect(collapseText(value, "join")).toBe("Latin; French");
  });

  it("returns null when there is no text", () => {
    expect(collapseText({ none: [] })).toBeNull();
    expect(collapseText(undefined)).toBeNull();
  });
});

describe("stripHtml", () => {
  it("removes tags and decodes common entities", () => {
    expect(stripHtml("<b>Bold</b> &amp;  <i>more</i>")).toBe("Bold & more");
  });

  it("decodes numeric and named entities", () => {
    expect(stripHtml("1350&#8211;1375")).toBe("1350\u20131375");
    expect(stripHtml("Ann&eacute;e &#x2013; f.&nbsp;12<br>r")).toBe("Ann\u00e9e \u2013 f. 12 r");
  });

  it("leaves plain text alone apart from whitespace", () => {
    expect(stripHtml("  MS 1 <  MS 2 ")).toBe("MS 1 < MS 2");
  });
});

// ── Metadata synonyms ─────────────────────────────────────────────────────

describe("mapMetadata", () => {
  it("prefers the earlier synonym regardless of document order", () => {
    const mapped = mapMetadata([
      { label: "Classmark", value: "MS Add. 1" },
      { label: "Shelfmark", value: "MS 2" },
    ]);
    expect(mapped.shelfmark).toBe("MS 2");
  });

  it("matches labels case-insensitively and ignores a trailing colon", () => {
    const mapped = mapMetadata([{ label: "date of creation:", value: "1300" }]);
    expect(mapped.date).toBe("1300");
  });

  it("puts per-source synonyms ahead of the defaults", () => {
    const table = mergeSynonyms({ shelfmark: ["Classmark"] });
    expect(table.shelfmark[0]).toBe("Classmark");
    expect(table.date).toEqual(DEFAULT_SYNONYMS.date);

    const mapped = mapMetadata(
      [
        { label: "Shelfmark", value: "MS 2" },
        { label: "Classmark", value: "MS Add. 1" },
      ],
      table,
    );
    expect(mapped.shelfmark).toBe("MS Add. 1");
  });
});

// ── Parsing ───────────────────────────────────────────────────────────────

describe("parseManifest", () => {
  it("detects v2 and reads its canvases", () => {
    const parsed = parseManifest(v2Manifest({ canvases: 3 }));
    expect(parsed.version).toBe(2);
    expect(parsed.canvases).toHaveLength(3);
    expect(parsed.canvases[0]?.imageService).toBe("https://images.example.org/page-1");
  });

  it("detects v3 and reads the painted image service", () => {
    const parsed = parseManifest(v3Manifest());
    expect(parsed.version).toBe(3);
    expect(parsed.label).toBe("Cambridge, Corpus Christi College, MS 049: Bible");
    expect(parsed.canvases[0]?.imageService).toBe("https://images.example.org/ms-049-001");
  });

  it("rejects documents without an id", () => {
    expect(() => parseManifest({ label: "x" })).toThrow("missing_id");
  });
});

// ── Normalization ─────────────────────────────────────────────────────────

describe("normalizeManifest", () => {
  it("maps a v3 manifest onto canonical fields", () => {
    const result = normalizeManifest(v3Manifest());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record).toEqual({
      manifestId: "https://iiif.example.org/ms-049/manifest",
      version: 3,
      label: "Cambridge, Corpus Christi College, MS 049: Bible",
      shelfmark: "MS 049",
      dateDisplay: "12th century",
      dateStart: 1100,
      dateEnd: 1199,
      contents: "Cambridge, Corpus Christi College, MS 049: Bible",
      provenance: null,
      language: "Latin",
      folios: null,
      thumbnailUrl: "https://images.example.org/ms-049-001/full/200,/0/default.jpg",
      imageCount: 1,
    });
  });

  it("reads the date from a v2 \"Date of Creation\" entry", () => {
    const doc = v2Manifest({ label: "MS 1: Psalter", metadata: [["Date of Creation", "12th century"]] });
    const result = normalizeManifest(doc);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record).toMatchObject({
      version: 2,
      label: "MS 1: Psalter",
      dateDisplay: "12th century",
      dateStart: 1100,
      dateEnd: 1199,
    });
  });

  it("uses source-specific labels", () => {
    const doc = v2Manifest({ metadata: [["Classmark", "MS Ff.1.23"]] });
    const result = normalizeManifest(doc, { labelSynonyms: { shelfmark: ["Classmark"] } });
    expect(result.ok && result.record.shelfmark).toBe("MS Ff.1.23");
  });

  it("reports structural problems instead of throwing", () => {
    const result = normalizeManifest("not a manifest");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe("document");
  });

  it("keeps a manifest id with a malformed percent-escape", () => {
    const result = normalizeManifest(v2Manifest({ id: "https://iiif.example.org/ms%zz/manifest" }));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.manifestId).toBe("https://iiif.example.org/ms%zz/manifest");
    expect(result.record.thumbnailUrl).toBe("https://images.example.org/page-1/full/200,/0/default.jpg");
  });

  it("turns an unexpected failure while reading into an error result", () => {
    const doc = {
      get "@id"(): string {
        throw new Error("unreadable field");
      },
    };
    const result = normalizeManifest(doc);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe("document");
    expect(result.error.message).toBe("Unreadable manifest: unreadable field");
  });

  it("truncates long contents", () => {
    const doc = v2Manifest({ metadata: [["Contents", "a".repeat(1500)]] });
    const result = normalizeManifest(doc);
    expect(result.ok && result.record.contents?.length).toBe(CONTENTS_MAX_LENGTH);
    expect(truncate("short")).toBe("short");
    expect(truncate("abcdefghij", 8)).toBe("abcde...");
  });
});
