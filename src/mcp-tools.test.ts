import { describe, it, expect } from 'vitest';
import { callTool, TOOLS } from './mcp-tools.js';

function payload(name: string, args: unknown): unknown {
  const result = callTool(name, args);
  expect(result.content).toHaveLength(1);
  return JSON.parse(result.content[0].text);
}

describe('MCP tools', () => {
  it('lists both tools', () => {
    expect(TOOLS.map(t => t.name)).toEqual(['check_state_machine', 'compile_state_machine']);
  });

  describe('check_state_machine', () => {
    it('reports a valid machine', () => {
      expect(payload('check_state_machine', { text: 'transitions: { *A + Go = B }' })).toEqual({
        valid: true,
        machineCount: 1,
        errorCount: 0,
        warningCount: 0,
        errors: [],
        warnings: [],
      });
    });

    it('reports errors with a code frame', () => {
      const text = 'transitions: { *A + Go = B, A + Go = C }';
      const result = payload('check_state_machine', { text });
      expect(result).toMatchObject({ valid: false, errorCount: 1 });
      expect(result).toHaveProperty('errors.0.code', 'FSM-TRANSITION-DUPLICATE');
      expect(result).toHaveProperty('errors.0.frame', `1 | ${text}\n  | ${' '.repeat(32)}^^`);
    });

    it('turns warnings into errors when strict', () => {
      const text = 'transitions: { *A + Go = B, C + Go = A }';
      expect(payload('check_state_machine', { text })).toMatchObject({ valid: true, warningCount: 1 });
      expect(payload('check_state_machine', { text, strict: true })).toMatchObject({ valid: false, errorCount: 1 });
    });
  });

  describe('compile_state_machine', () => {
    it('returns a TypeScript module by default', () => {
      const result = payload('compile_state_machine', { text: 'name: Door, transitions: { *Closed + Open = Opened }' });
      expect(result).toMatchObject({ ok: true, emit: 'typescript', diagnostics: [] });
      expect(result).toHaveProperty('artifact');
      const artifact = typeof result === 'object' && result !== null && 'artifact' in result ? result.artifact : undefined;
      expect(typeof artifact).toBe('string');
      expect(String(artifact)).toContain('export enum DoorState {');
    });

    it('returns a JSON table on request', () => {
      const result = payload('compile_state_machine', { text: 'transitions: { *A + Go = B }', emit: 'json' });
      const artifact = typeof result === 'object' && result !== null && 'artifact' in result ? result.artifact : undefined;
      expect(JSON.parse(String(artifact))).toMatchObject({ format: 'fsm-table', initial: 'A', transitions: [[0, 0, 1]] });
    });

    it('flags a failed compilation as an error result', () => {
      const result = callTool('compile_state_machine', { text: 'transitions: { A + Go = B }' });
      expect(result.isError).toBe(true);
      expect(JSON.parse(result.content[0].text)).toHaveProperty('diagnostics.0.code', 'FSM-INITIAL-MISSING');
    });

    it('reports clashing machines in one document instead of throwing', () => {
      const text = ['```fsm', 'transitions: { *A + Go = B }', '```', '```fsm', 'transitions: { *X + Go = Y }', '```'].join('\n');
      const result = callTool('compile_state_machine', { text });
      expect(result.isError).toBe(true);
      const body: unknown = JSON.parse(result.content[0].text);
      expect(body).toMatchObject({ ok: false });
      expect(body).toHaveProperty('diagnostics.0.code', 'FSM-NAMESPACE-CLASH');
      expect(body).toHaveProperty('diagnostics.0.line', 5);
    });
  });

  it('rejects unknown tools', () => {
    expect(() => callTool('render', {})).toThrow('Unknown tool: render');
  });

  it('rejects invalid arguments', () => {
    expect(() => callTool('check_state_machine', { text: 42 })).toThrow(/^Invalid arguments/);
    expect(() => callTool('compile_state_machine', { text: 'x', emit: 'yaml' })).toThrow(/^Invalid arguments/);
  });
});
