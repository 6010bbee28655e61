/** SGR styling shared by the server banner, the log formatter and the CLI. */

export const sgr =
  (...codes: number[]) =>
  (s: string): string =>
    `\x1b[${codes.join(";")}m${s}\x1b[0m`;

export const bold = sgr(1);
export const dim = sgr(2);

export const red = sgr(31);
export const green = sgr(32);
export const yellow = sgr(33);
export const magenta = sgr(35);
export const cyan = sgr(36);
export const gray = sgr(90);
export const white = sgr(97);

/** Black (or white) text on a colored block, padded by one space. */
export const badge = (background: number, text: string, foreground = 30): string =>
  sgr(background, foreground)(` ${text} `);

// biome-ignore lint/suspicious/noControlCharactersInRegex: matches SGR sequences
export const stripAnsi = (s: string): string => s.replace(/\x1b\[[0-9;]*m/g, "");
