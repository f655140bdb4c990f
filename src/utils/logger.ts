import pc from "picocolors";

function shouldDisableColor(): boolean {
  if ("NO_COLOR" in process.env) {
    return true;
  }

  const flag = process.env.TAGSIFT_NO_COLOR;
  if (flag === undefined) {
    return false;
  }

  const normalized = flag.trim().toLowerCase();
  return normalized === "" || normalized === "1" || normalized === "true" || normalized === "yes";
}

const isColorSupported = Boolean(process.stdout?.isTTY) && !shouldDisableColor();

type ColorFn = (input: string) => string;

const greenCheck: ColorFn = (input) => pc.green(input);
const yellowWarn: ColorFn = (input) => pc.yellow(input);
const redError: ColorFn = (input) => pc.red(input);
const cyanInfo: ColorFn = (input) => pc.cyan(input);
const dimNote: ColorFn = (input) => pc.dim(input);

let verboseEnabled = false;

function paint(color: ColorFn, message: string): string {
  return isColorSupported ? color(message) : message;
}

function output(stream: "log" | "warn" | "error", message: string): void {
  // eslint-disable-next-line no-console
  console[stream](message);
}

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export const logger = {
  info(message: string): void {
    output("log", paint(cyanInfo, message));
  },

  success(message: string): void {
    output("log", paint(greenCheck, message));
  },

  warn(message: string): void {
    const formatted = message.startsWith("⚠") ? message : `⚠ ${message}`;
    output("warn", paint(yellowWarn, formatted));
  },

  error(message: string): void {
    output("error", paint(redError, message));
  },

  note(message: string): void {
    output("log", paint(dimNote, message));
  },

  /** Only printed under --verbose. */
  debug(message: string): void {
    if (!verboseEnabled) return;
    output("log", paint(dimNote, `  · ${message}`));
  }
};

export function formatStrong(message: string): string {
  return paint(pc.bold, message);
}
