const RESET = "\u001b[0m";

export const colorModeOrder = ["auto", "always", "never"] as const;

export type ColorMode = (typeof colorModeOrder)[number];

let colorMode: ColorMode = "auto";

export function isColorMode(value: string): value is ColorMode {
  return colorModeOrder.some((mode) => mode === value);
}

// Diagnostics go to stderr, so that is the stream whose TTY-ness matters.
function detectAutoColor(): boolean {
  if (process.env.NO_COLOR && ["1", "true"].includes(process.env.NO_COLOR.toLowerCase())) {
    return false;
  }
  if (process.env.FORCE_COLOR && process.env.FORCE_COLOR !== "0") {
    return true;
  }
  return Boolean(process.stderr?.isTTY);
}

function colorEnabled(): boolean {
  if (colorMode === "always") {
    return true;
  }
  if (colorMode === "never") {
    return false;
  }
  return detectAutoColor();
}

function apply(code: string, text: string): string {
  if (!colorEnabled()) {
    return text;
  }
  return `\u001b[${code}m${text}${RESET}`;
}

export function setColorMode(mode: ColorMode): void {
  colorMode = mode;
}

export function getColorMode(): ColorMode {
  return colorMode;
}

export const colors = {
  dim: (text: string) => apply("2", text),
  red: (text: string) => apply("31", text),
};

export function formatNote(text: string): string {
  return colors.dim(text);
}
