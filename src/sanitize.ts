// CSI | OSC (BEL or ST) | DCS/SOS/PM/APC (ST) | charset select | single-char ESC forms.
// Applied to the whole buffer at once so sequences spanning lines are matched.
const ANSI_RE =
  // biome-ignore lint/suspicious/noControlCharactersInRegex: matching control sequences is the point
  /\x1b(?:\[[0-9;?]*[ -/]*[@-~]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[PX^_][^\x1b]*\x1b\\|[()][AB012]|[A-Z\\])/g;

const ASCII_SPACES = new Set([0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x20]);

// UTF-8 forms of the non-ASCII White_Space code points. U+FEFF is not one of them.
const UNICODE_SPACES: readonly Buffer[] = [
  0x85, 0xa0, 0x1680, 0x2000, 0x2001, 0x2002, 0x2003, 0x2004, 0x2005, 0x2006, 0x2007, 0x2008,
  0x2009, 0x200a, 0x2028, 0x2029, 0x202f, 0x205f, 0x3000,
].map((cp) => Buffer.from(String.fromCodePoint(cp), "utf-8"));

export interface SanitizeOptions {
  readonly strip: boolean;
  readonly trim: boolean;
}

/**
 * Remove terminal control sequences from `text`. The pattern is ASCII only,
 * so a latin1 view of raw bytes goes through unchanged apart from the matches.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_RE, "");
}

function spaceLengthAt(buf: Buffer, start: number, end: number): number {
  const byte = buf[start];
  if (start >= end || byte === undefined) return 0;
  if (ASCII_SPACES.has(byte)) return 1;
  const match = UNICODE_SPACES.find(
    (seq) => start + seq.length <= end && buf.subarray(start, start + seq.length).equals(seq),
  );
  return match ? match.length : 0;
}

function spaceLengthBefore(buf: Buffer, start: number, end: number): number {
  const byte = buf[end - 1];
  if (end <= start || byte === undefined) return 0;
  if (ASCII_SPACES.has(byte)) return 1;
  const match = UNICODE_SPACES.find(
    (seq) => end - seq.length >= start && buf.subarray(end - seq.length, end).equals(seq),
  );
  return match ? match.length : 0;
}

/**
 * Drop leading and trailing whitespace, ASCII or UTF-8 encoded, from raw
 * bytes. Bytes that are not valid UTF-8 are never treated as whitespace.
 */
export function trimSpace(buf: Buffer): Buffer {
  let start = 0;
  let end = buf.length;
  for (let n = spaceLengthAt(buf, start, end); n > 0; n = spaceLengthAt(buf, start, end)) {
    start += n;
  }
  for (let n = spaceLengthBefore(buf, start, end); n > 0; n = spaceLengthBefore(buf, start, end)) {
    end -= n;
  }
  return buf.subarray(start, end);
}

/** Clean captured input byte for byte; nothing is decoded as text. */
export function sanitize(input: Buffer, opts: SanitizeOptions): Buffer {
  let out = input;
  if (opts.strip) out = Buffer.from(stripAnsi(out.toString("latin1")), "latin1");
  if (opts.trim) out = trimSpace(out);
  return out;
}
