// morphseg/characters - CJK ideograph classification

/**
 * Code point ranges treated as CJK ideographs, inclusive on both ends.
 * Radicals are included so that isolated radicals are not dropped.
 */
export const CJK_IDEOGRAPH_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x3007, 0x3007],   // ideographic number zero
  [0x4E00, 0x9FFF],   // CJK Unified Ideographs
  [0x3400, 0x4DBF],   // Extension A
  [0xF900, 0xFAFF],   // Compatibility Ideographs
  [0x20000, 0x2A6DF], // Extension B
  [0x2A700, 0x2B73F], // Extension C
  [0x2B740, 0x2B81F], // Extension D
  [0x2F800, 0x2FA1F], // Compatibility Ideographs Supplement
  [0x2F00, 0x2FD5],   // Kangxi Radicals
  [0x2E80, 0x2EF3]    // CJK Radicals Supplement
];

function toClassPart(code: number): string {
  return `\\u{${code.toString(16)}}`;
}

const CJK_CLASS = CJK_IDEOGRAPH_RANGES
  .map(([from, to]) => from === to ? toClassPart(from) : `${toClassPart(from)}-${toClassPart(to)}`)
  .join('');

const CJK_PATTERN = new RegExp(`[${CJK_CLASS}]`, 'gu');
const CJK_SINGLE = new RegExp(`^[${CJK_CLASS}]$`, 'u');

export function isCjkIdeograph(char: string): boolean {
  return CJK_SINGLE.test(char);
}

/**
 * Every CJK ideograph of `text`, in order. Other characters are dropped.
 */
export function matchCjkIdeographs(text: string): string[] {
  return text.match(CJK_PATTERN) ?? [];
}

export function filterCjkIdeographs(text: string): string {
  return matchCjkIdeographs(text).join('');
}
