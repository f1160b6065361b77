import type { Diagnostic } from './types.js';

export interface FsmBlock {
  content: string;
  startLine: number; // 1-based line number of the first content line (line after opening fence)
  endLine: number;   // 1-based line number of the closing fence line
  info: string;      // raw info string after the opening fence
  fence: string;     // the fence marker used (``` or ~~~, length >= 3)
}

const FENCE_RE = /^(\s{0,3})(`{3,}|~{3,})\s*([^\n`]*)?\s*$/;

function isFsmInfo(info: string): boolean {
  const lang = (info.split(/\s+/)[0] || '').toLowerCase();
  return lang === 'fsm' || lang === 'statemachine';
}

export function extractFsmBlocks(text: string): FsmBlock[] {
  const lines = text.split(/\r?\n/);
  const blocks: FsmBlock[] = [];
  let i = 0;
  while (i < lines.length) {
    const m = FENCE_RE.exec(lines[i]);
    if (m) {
      const fence = m[2];
      const info = (m[3] || '').trim();
      if (isFsmInfo(info)) {
        // Closed by the same marker character, at least as long as the opener
        const close = new RegExp(`^\\s{0,3}${fence[0]}{${fence.length},}\\s*$`);
        const contentLines: string[] = [];
        const startLine = i + 2;
        i++;
        let closed = false;
        for (; i < lines.length; i++) {
          if (close.test(lines[i])) { closed = true; break; }
          contentLines.push(lines[i]);
        }
        const endLine = closed ? i + 1 : lines.length + 1;
        blocks.push({ content: contentLines.join('\n'), startLine, endLine, info, fence });
        if (closed) i++;
        continue;
      }
    }
    i++;
  }
  return blocks;
}

export function offsetDiagnostics(diagnostics: readonly Diagnostic[], lineOffset: number): Diagnostic[] {
  if (!lineOffset) return [...diagnostics];
  return diagnostics.map(d => ({ ...d, line: d.line + lineOffset }));
}
