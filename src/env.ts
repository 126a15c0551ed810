import fs from "fs";
import path from "path";

type EnvType = "string" | "number";

/**
 * Reads an environment variable. Without a fallback a missing variable is
 * an error; with one, the fallback is returned instead.
 */
export default function env(varName: string, expectedType?: "string", fallback?: string): string;
export default function env(varName: string, expectedType: "number", fallback?: number): number;
export default function env(
  varName: string,
  expectedType: EnvType = "string",
  fallback?: number | string,
): number | string {
  const value = process.env[varName];
  if (value == null || value === "") {
    if (fallback !== undefined) return fallback;
    throw new Error(`Could not find env var '${varName}'`);
  }

  if (expectedType === "number") {
    const numValue = Number(value);
    if (isNaN(numValue))
      throw new Error(
        `Expected '${varName}' to be a number, but it's not: '${value}'`,
      );
    return numValue;
  }
  return value;
}

const DOTENV_LINE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

function unquote(value: string): string {
  const quoted = value.match(/^(["'])(.*)\1$/);
  return quoted ? quoted[2] : value;
}

/**
 * Parses `KEY=VALUE` lines (optionally `export`ed or quoted) into `target`.
 * Variables already set there win.
 */
export function parseDotEnv(content: string, target: NodeJS.ProcessEnv = process.env) {
  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith("#")) return;

    const match = line.match(DOTENV_LINE);
    if (!match) {
      throw new Error(`Invalid line ${index + 1} in .env file: ${line}`);
    }
    const [, key, value] = match;
    if (!target[key]) target[key] = unquote(value.trim());
  });
}

/**
 * Loads every .env file from `startDir` up to the filesystem root,
 * nearest first.
 */
export function loadDotEnv(startDir: string = process.cwd()) {
  let cwd = path.resolve(startDir);
  while (true) {
    const envFile = path.join(cwd, ".env");
    if (fs.existsSync(envFile)) {
      console.log("Loading .env file", envFile);
      parseDotEnv(fs.readFileSync(envFile, "utf8"));
    }
    const parent = path.dirname(cwd);
    if (parent === cwd) break;
    cwd = parent;
  }
}
