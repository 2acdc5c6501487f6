import { DEFAULT_BULLET_GLYPH, DEFAULT_INDENT_WIDTH } from "@sprig/outline-render";

interface RawEnv {
  readonly [key: string]: string | undefined;
}

export interface TerminalConfig {
  /** JSON-lines log destination; `null` disables logging. */
  readonly logFile: string | null;
  readonly indentWidth: number;
  readonly bulletGlyph: string;
  readonly debugCells: boolean;
}

const toInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const boolFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }
  if (value === "1" || value.toLowerCase() === "true") {
    return true;
  }
  if (value === "0" || value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
};

const glyphFromEnv = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  if (!trimmed || Array.from(trimmed).length !== 1) {
    return fallback;
  }
  return trimmed;
};

export const loadConfig = (env: RawEnv = process.env): TerminalConfig => {
  const logFile = env.SPRIG_LOG_FILE?.trim();
  const indentWidth = toInt(env.SPRIG_INDENT_WIDTH, DEFAULT_INDENT_WIDTH);

  return {
    logFile: logFile && logFile.length > 0 ? logFile : null,
    indentWidth: indentWidth >= 1 ? indentWidth : DEFAULT_INDENT_WIDTH,
    bulletGlyph: glyphFromEnv(env.SPRIG_BULLET, DEFAULT_BULLET_GLYPH),
    debugCells: boolFromEnv(env.SPRIG_DEBUG_CELLS, false)
  };
};
