import type { Diagnostic } from './types.js';

export type OutputFormat = 'text' | 'json';

export function groupDiagnostics(diagnostics: readonly Diagnostic[]) {
  const errs = diagnostics.filter(d => d.severity === 'error');
  const warns = diagnostics.filter(d => d.severity === 'warning');
  return { errs, warns };
}

const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

// Codes whose snippet points at an insertion rather than at offending text.
const MISSING_CLOSER: Record<string, string> = {
  'FSM-BLOCK-MISSING-RBRACE': '}',
};

export function textReport(filename: string, content: string, diagnostics: readonly Diagnostic[]): string {
  const { errs, warns } = groupDiagnostics(diagnostics);
  if (errs.length === 0 && warns.length === 0) return 'Valid';

  const allLines = content.split(/\r?\n/);
  const numWidth = String(allLines.length).length;
  const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');
  const lines: string[] = [];

  const printBlock = (kind: 'error' | 'warning', d: Diagnostic) => {
    const kindColor = kind === 'error' ? `${RED}error${RESET}` : `${YELLOW}warning${RESET}`;
    lines.push(`${kindColor}[${d.code}]: ${d.message}`);
    lines.push(`at ${filename}:${d.line}:${d.column}`);
    const idx = Math.max(0, Math.min(allLines.length - 1, d.line - 1));
    const prev = idx > 0 ? allLines[idx - 1] : undefined;
    const text = allLines[idx] ?? '';
    const next = idx + 1 < allLines.length ? allLines[idx + 1] : undefined;

    const closer = MISSING_CLOSER[d.code];
    if (closer) {
      // Show where the block opened, then the line the closer belongs on.
      let headerIdx = -1;
      for (let i = idx; i >= 0 && i >= idx - 100; i--) {
        if (/\btransitions\s*:\s*\{/.test(allLines[i] ?? '')) { headerIdx = i; break; }
      }
      if (headerIdx >= 0) {
        lines.push(`  ${fmtNum(headerIdx + 1)} | ${allLines[headerIdx]}  ${DIM}← start of 'transitions'${RESET}`);
        if (headerIdx < idx - 1) lines.push(`  ${' '.repeat(numWidth)} | …`);
      }
      if (headerIdx !== idx) lines.push(`  ${fmtNum(idx + 1)} | ${text}`);
      const indent = allLines[headerIdx]?.match(/^\s*/)?.[0] ?? '';
      lines.push(`  ${fmtNum(idx + 2)} | ${indent}${closer}  ${DIM}← insert '${closer}' here${RESET}`);
    } else {
      if (typeof prev === 'string') lines.push(`  ${fmtNum(idx)} | ${prev}`);
      lines.push(`  ${fmtNum(idx + 1)} | ${text}`);
      const caretPad = ' '.repeat(Math.max(0, d.column - 1));
      const caretLen = Math.max(1, d.length ?? 1);
      const caretColor = kind === 'error' ? RED : YELLOW;
      lines.push(`  ${' '.repeat(numWidth)} | ${caretPad}${caretColor}${'^'.repeat(caretLen)}${RESET}`);
      if (typeof next === 'string') lines.push(`  ${fmtNum(idx + 2)} | ${next}`);
    }
    if (d.hint) {
      const hintLines = d.hint.split(/\r?\n/);
      lines.push(`hint: ${hintLines[0]}`);
      for (let i = 1; i < hintLines.length; i++) lines.push(`  ${hintLines[i]}`);
    }
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  return lines.join('\n');
}

export interface JsonResult {
  file: string;
  valid: boolean;
  errorCount: number;
  warningCount: number;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

export function toJsonResult(filename: string, diagnostics: readonly Diagnostic[]): JsonResult {
  const { errs, warns } = groupDiagnostics(diagnostics);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
}
