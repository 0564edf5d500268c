import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import { SUPPORTED_INTERVALS } from "./yahoo";

const SymbolSchema = z.object({
  name: z.string().trim().min(1),
  tickers: z.array(z.string().trim().min(1)).min(1),
  interval: z.enum(SUPPORTED_INTERVALS).default("15m"),
  range: z.string().trim().min(1).default("5d"),
  htfInterval: z.enum(SUPPORTED_INTERVALS).default("60m"),
  htfRange: z.string().trim().min(1).default("10d"),
});

const SymbolTableSchema = z.array(SymbolSchema).min(1);

export type SymbolConfig = z.infer<typeof SymbolSchema>;

export function parseSymbols(raw: unknown): SymbolConfig[] {
  const parsed = SymbolTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `symbols[${issue.path.join(".")}]: ${issue.message}`),
    );
  }
  const seen = new Set<string>();
  for (const s of parsed.data) {
    const key = s.name.toUpperCase();
    if (seen.has(key)) throw new ConfigError([`duplicate symbol name: ${s.name}`]);
    seen.add(key);
  }
  return parsed.data;
}

/** Lê a tabela de símbolos e mantém só os nomes em `only` (todos quando vazio). */
export function loadSymbols(filePath: string, only: readonly string[] = []): SymbolConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError([`cannot read symbol table ${filePath}: ${errorMessage(err)}`]);
  }
  const symbols = parseSymbols(raw);
  if (!only.length) return symbols;

  const wanted = new Set(only.map((n) => n.toUpperCase()));
  const unknown = [...wanted].filter((n) => !symbols.some((s) => s.name.toUpperCase() === n));
  if (unknown.length) {
    throw new ConfigError(unknown.map((n) => `unknown symbol: ${n}`));
  }
  return symbols.filter((s) => wanted.has(s.name.toUpperCase()));
}
