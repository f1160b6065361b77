#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import type { Diagnostic } from './core/types.js';
import { toJsonResult, textReport, type JsonResult, type OutputFormat } from './core/format.js';
import { compileDocument, documentKind } from './core/documents.js';
import { emit } from './emit/index.js';
import type { EmitTarget } from './emit/interfaces.js';

function printUsage() {
    console.log('Usage: fsmc [check] <file|directory|->');
    console.log('       fsmc compile <file|-> [--emit ts|json] [--out <path>]');
    console.log('  - Checks .fsm files, or Markdown with ```fsm / ```statemachine fences');
    console.log('  - When a directory is given, scans recursively for .fsm/.md/.markdown/.mdx');
    console.log('  - "fsmc compile" prints the generated TypeScript module or JSON table');
    console.log('Options:');
    console.log('  --include, -I   Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
    console.log('  --strict, -s    Treat warnings (unreachable states, redundant wildcards) as errors');
    console.log('  --format, -f    Report format: text|json (default: text)');
    console.log('  --emit          Artifact for "compile": ts|json (default: ts)');
    console.log('  --out, -o       Write the artifact to a file instead of stdout');
}

interface CliOptions {
    format: OutputFormat;
    strict: boolean;
    emit: EmitTarget;
    out: string | null;
    includeGlobs: string[];
    excludeGlobs: string[];
    useGitignore: boolean;
    positionals: string[];
}

function parseArgs(args: string[]): CliOptions {
    const opts: CliOptions = {
        format: 'text',
        strict: false,
        emit: 'typescript',
        out: null,
        includeGlobs: [],
        excludeGlobs: [],
        useGitignore: true,
        positionals: [],
    };
    const splitGlobs = (v: string) => v.split(',').map(s => s.trim()).filter(Boolean);
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        const v = args[i + 1];
        if (a === '--format' || a === '-f') {
            const f = (v || '').toLowerCase();
            if (f === 'json' || f === 'text') { opts.format = f; i++; continue; }
            fail(`Unknown format: ${v ?? '(missing)'}`);
        }
        if (a === '--emit' || a.startsWith('--emit=')) {
            const raw = (a === '--emit' ? v : a.slice('--emit='.length)) || '';
            const e = raw.toLowerCase();
            if (e === 'ts' || e === 'typescript') opts.emit = 'typescript';
            else if (e === 'json') opts.emit = 'json';
            else fail(`Unknown artifact: ${raw || '(missing)'}`);
            if (a === '--emit') i++;
            continue;
        }
        if (a === '--out' || a === '-o') {
            if (!v) fail('--out needs a path');
            opts.out = v; i++; continue;
        }
        if (a === '--strict' || a === '-s') { opts.strict = true; continue; }
        if (a === '--include' || a === '-I') {
            if (v) { opts.includeGlobs.push(...splitGlobs(v)); i++; continue; }
        }
        if (a === '--exclude' || a === '-E') {
            if (v) { opts.excludeGlobs.push(...splitGlobs(v)); i++; continue; }
        }
        if (a === '--no-gitignore') { opts.useGitignore = false; continue; }
        if (a === '--gitignore') { opts.useGitignore = true; continue; }
        if (a === '-' || !a.startsWith('-')) opts.positionals.push(a);
    }
    return opts;
}

function fail(message: string): never {
    console.error(message);
    process.exit(1);
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) fail(`File not found: ${arg}`);
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

const DEFAULT_INCLUDE_GLOBS = [
    '**/*.fsm',
    '**/*.md',
    '**/*.markdown',
    '**/*.mdx',
];

const DEFAULT_IGNORE_DIRS = [
    '**/.git/**',
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/coverage/**',
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
        ...excludes,
        ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const files = await globby(patterns, {
        cwd: path.resolve(root),
        absolute: true,
        dot: true,
        gitignore: useGitignore,
        ignore,
        followSymbolicLinks: false,
    });
    return files.sort();
}

function countErrors(diagnostics: readonly Diagnostic[]) {
    return diagnostics.filter(d => d.severity === 'error').length;
}

async function runCheckDirectory(root: string, opts: CliOptions) {
    const files = await listCandidateFiles(root, opts.includeGlobs, opts.excludeGlobs, opts.useGitignore);
    type FileResult = { file: string; content: string; diagnostics: Diagnostic[] };
    const results: FileResult[] = [];
    let machineCount = 0;
    for (const file of files) {
        const content = fs.readFileSync(file, 'utf8');
        const res = compileDocument(content, documentKind(file), { strict: opts.strict });
        machineCount += res.machineCount;
        if (res.diagnostics.length > 0) results.push({ file, content, diagnostics: res.diagnostics });
    }

    const totalErrors = results.reduce((n, r) => n + countErrors(r.diagnostics), 0);
    if (opts.format === 'json') {
        const jsonFiles: JsonResult[] = files.map((file) => {
            const found = results.find(r => r.file === file);
            return toJsonResult(file, found ? found.diagnostics : []);
        });
        const warningCount = jsonFiles.reduce((n, jf) => n + jf.warningCount, 0);
        const payload = { valid: totalErrors === 0, files: jsonFiles, errorCount: totalErrors, warningCount, machineCount };
        console.log(JSON.stringify(payload, null, 2));
        process.exit(totalErrors === 0 ? 0 : 1);
    }

    if (results.length === 0) {
        console.log(machineCount === 0 ? 'No state machines found.' : `All ${machineCount} state machine(s) valid.`);
        process.exit(0);
    }
    for (const r of results) {
        const report = textReport(r.file, r.content, r.diagnostics).trimEnd();
        if (countErrors(r.diagnostics) > 0) console.error(report); else console.log(report);
    }
    process.exit(totalErrors === 0 ? 0 : 1);
}

function runCheckFile(target: string, opts: CliOptions) {
    const { content, filename } = readInput(target);
    const res = compileDocument(content, documentKind(filename), { strict: opts.strict });
    const errorCount = countErrors(res.diagnostics);

    if (opts.format === 'json') {
        const json = { ...toJsonResult(filename, res.diagnostics), machineCount: res.machineCount };
        console.log(JSON.stringify(json, null, 2));
        process.exit(json.valid ? 0 : 1);
    }
    if (res.machineCount === 0) {
        console.log('No state machines found.');
        process.exit(0);
    }
    const report = textReport(filename, content, res.diagnostics);
    if (errorCount > 0) console.error(report); else console.log(report);
    process.exit(errorCount > 0 ? 1 : 0);
}

function runCompile(target: string, opts: CliOptions) {
    const { content, filename } = readInput(target);
    const res = compileDocument(content, documentKind(filename), { strict: opts.strict });
    if (res.machineCount === 0) fail(`No state machines found in ${filename}.`);
    if (countErrors(res.diagnostics) > 0) {
        console.error(textReport(filename, content, res.diagnostics).trimEnd());
        process.exit(1);
    }
    // Warnings still go to stderr so the artifact on stdout stays clean
    if (res.diagnostics.length > 0) console.error(textReport(filename, content, res.diagnostics).trimEnd());

    const artifact = emit(res.machines, { target: opts.emit });
    if (opts.out) {
        fs.mkdirSync(path.dirname(path.resolve(opts.out)), { recursive: true });
        fs.writeFileSync(opts.out, artifact, 'utf8');
        console.error(`Wrote ${res.machines.length} state machine(s) to ${opts.out}`);
    } else {
        process.stdout.write(artifact);
    }
    process.exit(0);
}

async function main() {
    let args = process.argv.slice(2);
    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    let command: 'check' | 'compile' = 'check';
    const first = args[0];
    if (first === 'check' || first === 'compile') {
        command = first;
        args = args.slice(1);
    }
    const opts = parseArgs(args);
    const target = opts.positionals[0];
    if (!target) {
        printUsage();
        process.exit(1);
    }

    if (command === 'compile') {
        runCompile(target, opts);
        return;
    }
    if (isDirectory(target)) {
        await runCheckDirectory(target, opts);
        return;
    }
    runCheckFile(target, opts);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
    process.exit(1);
});
