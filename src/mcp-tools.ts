import { z } from 'zod';
import type { Diagnostic } from './core/types.js';
import { codeFrame } from './core/diagnostics.js';
import { compileDocument } from './core/documents.js';
import { emit } from './emit/index.js';

// Input schemas using Zod
export const CheckStateMachineSchema = z.object({
  text: z.string().describe('State machine description, or Markdown content with ```fsm blocks'),
  strict: z.boolean().optional().describe('Treat warnings as errors'),
});

export const CompileStateMachineSchema = z.object({
  text: z.string().describe('State machine description, or Markdown content with ```fsm blocks'),
  emit: z.enum(['typescript', 'json']).optional().describe('Artifact to produce (default: typescript)'),
  strict: z.boolean().optional().describe('Treat warnings as errors'),
});

const textProperty = {
  type: 'string',
  description: 'State machine description (e.g. "transitions: { *Idle + Start = Running }") or Markdown with ```fsm blocks',
};
const strictProperty = {
  type: 'boolean',
  description: 'Set to true to fail on warnings such as unreachable states',
};

export const TOOLS = [
  {
    name: 'check_state_machine',
    description:
      'Validate a state machine transition table before using it. Reports syntax errors, missing or repeated ' +
      'initial states, duplicate transitions, ambiguous wildcards and unreachable states with line/column positions.',
    inputSchema: {
      type: 'object' as const,
      properties: { text: textProperty, strict: strictProperty },
      required: ['text'],
    },
  },
  {
    name: 'compile_state_machine',
    description:
      'Compile a state machine transition table into a TypeScript module (state/event enums, default state and a ' +
      'processEvent lookup) or a JSON table for the generic runtime.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: textProperty,
        emit: { type: 'string', enum: ['typescript', 'json'], description: 'Artifact to produce (default: typescript)' },
        strict: strictProperty,
      },
      required: ['text'],
    },
  },
];

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function withFrames(text: string, diagnostics: readonly Diagnostic[]) {
  return diagnostics.map(d => ({ ...d, frame: codeFrame(text, d.line, d.column, d.length ?? 1) }));
}

function jsonContent(payload: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

/**
 * Handle one MCP tool call. Throws on an unknown tool or invalid arguments;
 * compile failures are reported in the result, not thrown.
 */
export function callTool(name: string, args: unknown): ToolResult {
  try {
    if (name === 'check_state_machine') {
      const { text, strict = false } = CheckStateMachineSchema.parse(args);
      const res = compileDocument(text, 'auto', { strict });
      const errors = res.diagnostics.filter(d => d.severity === 'error');
      const warnings = res.diagnostics.filter(d => d.severity === 'warning');
      return jsonContent({
        valid: errors.length === 0,
        machineCount: res.machineCount,
        errorCount: errors.length,
        warningCount: warnings.length,
        errors: withFrames(text, errors),
        warnings: withFrames(text, warnings),
      });
    }

    if (name === 'compile_state_machine') {
      const { text, emit: target = 'typescript', strict = false } = CompileStateMachineSchema.parse(args);
      const res = compileDocument(text, 'auto', { strict });
      const ok = res.machines.length === res.machineCount && !res.diagnostics.some(d => d.severity === 'error');
      if (!ok) {
        return jsonContent({ ok: false, diagnostics: withFrames(text, res.diagnostics) }, true);
      }
      return jsonContent({
        ok: true,
        emit: target,
        artifact: emit(res.machines, { target }),
        diagnostics: withFrames(text, res.diagnostics),
      });
    }

    throw new Error(`Unknown tool: ${name}`);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(`Invalid arguments: ${error.message}`);
    }
    throw error;
  }
}
