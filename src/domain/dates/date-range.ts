// ---------------------------------------------------------------------------
// Best-effort conversion of catalogue date strings into year ranges.
//
// Handles Arabic years and ranges, Roman-numeral centuries with fractions
// and qualifiers (`XV 1/4`, `XVex`, `s. xi`), and English ordinal centuries
// (`second half of the 12th century`).
// ---------------------------------------------------------------------------

export interface DateRange {
  start: number | null;
  end: number | null;
}

const NO_DATE: DateRange = { start: null, end: null };

// Roman numerals up to XXXIX; enough for any century of the common era.
const ROMAN = "(X{0,3}(?:IX|IV|V?I{0,3}))";
const DASH = "\\s*[-\\u2013]\\s*";
const ORDINAL = "(\\d{1,2})(?:st|nd|rd|th)";

const ROMAN_VALUES: Record<string, number> = { I: 1, V: 5, X: 10 };

/** `XIV` → 14; `null` for empty or malformed input. */
export function romanToInt(roman: string): number | null {
  const chars = roman.toUpperCase().split("");
  if (chars.length === 0) return null;
  let total = 0;
  for (let i = 0; i < chars.length; i++) {
    const value = ROMAN_VALUES[chars[i] ?? ""];
    if (value === undefined) return null;
    const next = ROMAN_VALUES[chars[i + 1] ?? ""] ?? 0;
    total += value < next ? -value : value;
  }
  return total > 0 ? total : null;
}

function centuryRange(century: number): DateRange {
  return { start: (century - 1) * 100, end: century * 100 - 1 };
}

/** Offsets into a century for its n-th part of `parts` equal parts. */
function fractionRange(century: number, num: number, parts: number): DateRange | null {
  if (num < 1 || num > parts) return null;
  const base = (century - 1) * 100;
  if (parts === 2) {
    return num === 1
      ? { start: base, end: base + 49 }
      : { start: base + 50, end: base + 99 };
  }
  if (parts === 3 || parts === 4) {
    const size = parts === 4 ? 25 : 33;
    return {
      start: base + (num - 1) * size,
      end: base + Math.min(num * size - 1, 99),
    };
  }
  return null;
}

function qualifierRange(century: number, qualifier: string): DateRange | null {
  const base = (century - 1) * 100;
  switch (qualifier.toLowerCase()) {
    case "in":
    case "early":
      return { start: base, end: base + 25 };
    case "med":
    case "mid":
      return { start: base + 25, end: base + 74 };
    case "ex":
    case "late":
      return { start: base + 75, end: base + 99 };
    default:
      return null;
  }
}

const ORDINAL_WORDS: Record<string, number> = {
  first: 1,
  "1st": 1,
  second: 2,
  "2nd": 2,
  third: 3,
  "3rd": 3,
  fourth: 4,
  "4th": 4,
};

/** Strip decoration that never carries date information. */
function clean(display: string): { text: string; circa: boolean } {
  let s = display.trim();
  s = s.replace(/\([^)]*\)/g, " ");
  s = s.replace(/[[\]]/g, "");
  s = s.replace(/\s+/g, " ").trim();
  s = s.replace(/^s\.\s*|^s\s+(?=[ivx])/i, "");
  const circa = /^(?:circa\b|ca\.|ca\b|c\.)/i.test(s);
  s = s.replace(/^(?:circa\b|ca\.|ca\b|c\.)\s*/i, "");
  s = s
    .replace(/¼/g, "1/4")
    .replace(/½/g, "1/2")
    .replace(/¾/g, "3/4")
    .replace(/¹/g, "1")
    .replace(/²/g, "2")
    .replace(/³/g, "3");
  return { text: s.trim(), circa };
}

/**
 * Parse a human-readable date into `{ start, end }` years.  Open-ended
 * forms leave one side `null`; unparseable input yields both `null`.
 */
export function parseDateRange(display: string | null | undefined): DateRange {
  if (!display) return NO_DATE;
  const { text: s, circa } = clean(display);
  if (s.length === 0) return NO_DATE;

  let m = new RegExp(`^(\\d{4})${DASH}(\\d{4})`).exec(s);
  if (m) return { start: Number(m[1]), end: Number(m[2]) };

  // 1370-80
  m = new RegExp(`^(\\d{4})${DASH}(\\d{1,2})(?=\\s|$)`).exec(s);
  if (m) {
    const start = Number(m[1]);
    return { start, end: Math.floor(start / 100) * 100 + Number(m[2]) };
  }

  m = /^between\s+(\d{4})\s*(?:and|-|–)\s*(\d{4})/i.exec(s);
  if (m) return { start: Number(m[1]), end: Number(m[2]) };

  m = /^(?:before|not after|by)\s+(\d{4})/i.exec(s);
  if (m) return { start: null, end: Number(m[1]) };

  m = /^(?:after|not before)\s+(\d{4})/i.exec(s);
  if (m) return { start: Number(m[1]), end: null };

  m = /^(\d{4})(?!\d)/.exec(s);
  if (m) {
    const year = Number(m[1]);
    return circa ? { start: year - 10, end: year + 10 } : { start: year, end: year };
  }

  const romanRange = new RegExp(`^${ROMAN}${DASH}${ROMAN}(?:\\s|$)`, "i").exec(s);
  if (romanRange) {
    const first = romanToInt(romanRange[1] ?? "");
    const last = romanToInt(romanRange[2] ?? "");
    if (first !== null && last !== null) {
      return { start: (first - 1) * 100, end: last * 100 - 1 };
    }
  }

  const romanFraction = new RegExp(`^${ROMAN}\\s*(\\d)/(\\d)`, "i").exec(s);
  if (romanFraction) {
    const century = romanToInt(romanFraction[1] ?? "");
    if (century !== null) {
      const range = fractionRange(
        century,
        Number(romanFraction[2]),
        Number(romanFraction[3]),
      );
      if (range) return range;
    }
  }

  const romanQualifier = new RegExp(`^${ROMAN}\\s*(in|med|ex)\\b`, "i").exec(s);
  if (romanQualifier) {
    const century = romanToInt(romanQualifier[1] ?? "");
    if (century !== null) {
      const range = qualifierRange(century, romanQualifier[2] ?? "");
      if (range) return range;
    }
  }

  // XIV 2 (second half)
  const romanHalf = new RegExp(`^${ROMAN}\\s+([12])(?:\\s|$)`, "i").exec(s);
  if (romanHalf) {
    const century = romanToInt(romanHalf[1] ?? "");
    if (century !== null) {
      const range = fractionRange(century, Number(romanHalf[2]), 2);
      if (range) return range;
    }
  }

  const bareRoman = new RegExp(`^${ROMAN}(?:\\s|$|[,;.])`, "i").exec(s);
  if (bareRoman) {
    const century = romanToInt(bareRoman[1] ?? "");
    if (century !== null) return centuryRange(century);
  }

  const ordinalRange = new RegExp(
    `${ORDINAL}?${DASH}${ORDINAL}\\s+centur(?:y|ies)`,
    "i",
  ).exec(s);
  if (ordinalRange) {
    const first = Number(ordinalRange[1] ?? ordinalRange[2]);
    const last = Number(ordinalRange[2]);
    return { start: (first - 1) * 100, end: last * 100 - 1 };
  }

  const part = new RegExp(
    `(first|second|third|fourth|last|1st|2nd|3rd|4th)\\s+(half|quarter|third)\\s+of\\s+(?:the\\s+)?${ORDINAL}\\s+century`,
    "i",
  ).exec(s);
  if (part) {
    const word = (part[1] ?? "").toLowerCase();
    const unit = (part[2] ?? "").toLowerCase();
    const parts = unit === "half" ? 2 : unit === "third" ? 3 : 4;
    const num = word === "last" ? parts : (ORDINAL_WORDS[word] ?? 0);
    const range = fractionRange(Number(part[3]), num, parts);
    if (range) return range;
  }

  const qualified = new RegExp(`^(early|mid|late)[\\s-]+${ORDINAL}\\s+century`, "i").exec(s);
  if (qualified) {
    const range = qualifierRange(Number(qualified[2]), qualified[1] ?? "");
    if (range) return range;
  }

  const ordinal = new RegExp(`${ORDINAL}\\s*century`, "i").exec(s);
  if (ordinal) return centuryRange(Number(ordinal[1]));

  // Years embedded in free text: "England, 1250" or "written 1290 and 1310".
  const years = s.match(/\b\d{4}\b/g);
  if (years && years.length > 0) {
    const first = Number(years[0]);
    const last = Number(years[years.length - 1]);
    return { start: first, end: last };
  }

  return NO_DATE;
}
