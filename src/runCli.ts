import { existsSync, readdirSync, statSync } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';

import { renderBindings, runBuild, type RunBuildOptions } from './builder.js';
import { getCacheFile, getStagingDir } from './cache/cachePaths.js';
import { clearCache, loadCacheEntry } from './cache/cacheManager.js';
import { generateBlock } from './codegen/index.js';
import { detectCompilers, formatDiagnostics, listTargets, mapTargetTriple, sanityCheckZig } from './compiler/index.js';
import { isOptimizeMode, loadOptionalConfig, manifestDirFor, resolveSettings, OPTIMIZE_MODES } from './dx/config.js';
import { logDebug } from './dx/logger.js';
import { CompilerFailedError, ZigbindError } from './errors.js';
import { createParser } from './parser/index.js';
import { COMPILATION_MODES, isCompilationMode, readHostFile } from './scanner/index.js';

type Env = Record<string, string | undefined>;

export type CliIo = {
	out(line: string): void;
	err(line: string): void;
	env: Env;
	cwd: string;
};

export const consoleIo: CliIo = {
	// eslint-disable-next-line no-console
	out: (line) => console.log(line),
	// eslint-disable-next-line no-console
	err: (line) => console.error(line),
	env: process.env,
	cwd: process.cwd(),
};

const VALUE_FLAGS = new Set(['--out', '--mode', '--target', '--optimize', '--zig']);

function getFlagValue(argv: string[], name: string): string | undefined {
	const idx = argv.indexOf(name);
	if (idx === -1) return undefined;
	return argv[idx + 1];
}

function hasFlag(argv: string[], name: string): boolean {
	return argv.includes(name);
}

/** Arguments that are neither flags nor flag values. */
function positionals(argv: string[]): string[] {
	const out: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		if (VALUE_FLAGS.has(argv[i])) i++;
		else if (!argv[i].startsWith('--')) out.push(argv[i]);
	}
	return out;
}

function usage(io: CliIo) {
	io.out(`zigbind

Usage:
	zigbind build [srcRoot] [--out <dir>] [--mode <mode>] [--target <triple>] [--optimize <mode>] [--release] [--zig <path>]
	zigbind expand <file.rs>
	zigbind targets
	zigbind doctor
	zigbind cache status [outDir]
	zigbind cache clean [outDir]

Examples:
	zigbind build src/
	zigbind build src/ --mode modular-build --target aarch64-unknown-linux-gnu --release
	zigbind expand src/lib.rs
	zigbind cache status target/zigbind

Notes:
	- build prints cargo: directives on stdout; call it from build.rs
	- modes: ${COMPILATION_MODES.join(', ')}
	- optimize: ${OPTIMIZE_MODES.join(', ')}
	- ZIG_PATH selects the Zig executable; ZIGBIND_DEBUG=1 enables debug logs
`);
}

function fmtOk(msg: string) {
	return `✓ ${msg}`;
}

function fmtFail(msg: string) {
	return `✗ ${msg}`;
}

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

function folderSizeBytes(dir: string): number {
	let bytes = 0;
	if (!existsSync(dir)) return 0;
	for (const ent of readdirSync(dir, { withFileTypes: true })) {
		const p = join(dir, ent.name);
		try {
			if (ent.isDirectory()) bytes += folderSizeBytes(p);
			else if (ent.isFile()) bytes += statSync(p).size;
		} catch (e) {
			logDebug('cache size: skipped entry', { path: p, err: errorMessage(e) });
		}
	}
	return bytes;
}

function humanBytes(bytes: number) {
	const u = ['B', 'KB', 'MB', 'GB'];
	let b = bytes;
	let i = 0;
	while (b >= 1024 && i < u.length - 1) {
		b /= 1024;
		i++;
	}
	return `${b.toFixed(i === 0 ? 0 : 1)} ${u[i]}`;
}

function displayPath(io: CliIo, p: string) {
	const rel = relative(io.cwd, p);
	return rel && !rel.startsWith('..') ? rel.split(sep).join('/') : p;
}

/** The out directory a build from `io.cwd` would use. */
async function defaultOutDir(io: CliIo, explicit: string | undefined): Promise<string> {
	if (explicit) return resolve(io.cwd, explicit);
	const srcRoot = resolve(io.cwd, 'src');
	const config = await loadOptionalConfig(resolve(manifestDirFor(srcRoot, io.env)));
	return resolveSettings(srcRoot, {}, config, io.env).outDir;
}

async function cmdBuild(argv: string[], io: CliIo): Promise<number> {
	const [root = 'src'] = positionals(argv);
	const options: RunBuildOptions = { env: io.env, printDirectives: false };

	const mode = getFlagValue(argv, '--mode');
	if (mode !== undefined) {
		if (!isCompilationMode(mode)) {
			io.err(`Invalid --mode (expected: ${COMPILATION_MODES.join('|')})`);
			return 1;
		}
		options.mode = mode;
	}
	const optimize = getFlagValue(argv, '--optimize');
	if (optimize !== undefined) {
		if (!isOptimizeMode(optimize)) {
			io.err(`Invalid --optimize (expected: ${OPTIMIZE_MODES.join('|')})`);
			return 1;
		}
		options.optimize = optimize;
	}
	const out = getFlagValue(argv, '--out');
	if (out) options.outDir = resolve(io.cwd, out);
	options.target = getFlagValue(argv, '--target');
	options.zigPath = getFlagValue(argv, '--zig');
	options.release = hasFlag(argv, '--release');

	const res = await runBuild(resolve(io.cwd, root), options);
	for (const d of res.directives) io.out(`cargo:${d}`);
	const how = res.artifact.artifactPath ? (res.artifact.cached ? 'cached' : 'compiled') : 'nothing to compile';
	io.err(fmtOk(`${res.blocks.length} binding block(s) -> ${displayPath(io, res.bindingsPath)} (${how})`));
	return 0;
}

function cmdExpand(argv: string[], io: CliIo): number {
	const [file] = positionals(argv);
	if (!file) {
		io.err('Missing host file (ex: src/lib.rs)');
		return 1;
	}
	const path = resolve(io.cwd, file);
	if (!existsSync(path)) {
		io.err(fmtFail(`No such file: ${file}`));
		return 1;
	}
	const manifestDir = resolve(io.env.CARGO_MANIFEST_DIR || io.cwd);
	const blocks = readHostFile(path, displayPath(io, path), manifestDir).map((block) => ({
		block,
		...generateBlock(block),
	}));
	if (!blocks.length) {
		io.err(fmtOk(`No binding blocks in ${file}`));
		return 0;
	}
	io.out(renderBindings(blocks).replace(/\n$/, ''));
	return 0;
}

function cmdTargets(io: CliIo): number {
	const rows = listTargets();
	const width = Math.max(...rows.map((r) => r.rust.length));
	for (const r of rows) io.out(`${r.rust.padEnd(width)}  ${r.zig}`);
	return 0;
}

async function cmdDoctor(io: CliIo): Promise<number> {
	const lines: string[] = [];

	try {
		const { platform, zig } = detectCompilers(io.env.ZIG_PATH || undefined);
		lines.push(fmtOk(`Host platform ${platform.platform}/${platform.arch}`));
		lines.push(fmtOk(`Zig compiler detected (${zig.version} at ${zig.path})`));
		try {
			sanityCheckZig(zig);
			lines.push(fmtOk('Zig builds a sample object'));
		} catch (e) {
			lines.push(fmtFail(errorMessage(e)));
		}
	} catch (e) {
		lines.push(fmtFail(errorMessage(e)));
	}

	try {
		createParser();
		lines.push(fmtOk('Rust grammar loaded (tree-sitter-rust)'));
	} catch (e) {
		lines.push(fmtFail(`Rust grammar failed to load: ${errorMessage(e)}`));
	}

	const target = io.env.TARGET;
	if (target) {
		try {
			lines.push(fmtOk(`Target ${target} -> ${mapTargetTriple(target) ?? 'native'}`));
		} catch (e) {
			lines.push(fmtFail(errorMessage(e).split('\n')[0]));
		}
	}

	const outDir = await defaultOutDir(io, undefined);
	try {
		const st = existsSync(outDir) ? statSync(outDir) : null;
		if (!st) lines.push(fmtOk(`Output directory will be created at ${outDir}`));
		else if (st.isDirectory()) lines.push(fmtOk(`Output directory OK (${outDir})`));
		else lines.push(fmtFail(`Output path is not a directory: ${outDir}`));
	} catch (e) {
		lines.push(fmtFail(`Output directory not accessible: ${errorMessage(e)}`));
	}

	io.out(lines.join('\n'));
	return lines.some((l) => l.startsWith('✗')) ? 1 : 0;
}

async function cmdCache(argv: string[], io: CliIo): Promise<number> {
	const [sub, dir] = positionals(argv);
	if (sub !== 'status' && sub !== 'clean') {
		io.err('Usage: zigbind cache <status|clean> [outDir]');
		return 1;
	}
	const outDir = await defaultOutDir(io, dir);

	if (sub === 'clean') {
		const removed = clearCache(outDir);
		io.out(fmtOk(removed.length ? `Cache cleaned (${removed.length} path(s) removed)` : 'Cache already empty'));
		return 0;
	}

	const entry = loadCacheEntry(outDir);
	if (!entry) {
		io.out(fmtOk(`Cache empty (no ${getCacheFile(outDir)})`));
		return 0;
	}
	const library = existsSync(entry.artifactPath) ? entry.artifactPath : `${entry.artifactPath} (missing)`;
	const bytes =
		folderSizeBytes(getStagingDir(outDir)) + (existsSync(entry.artifactPath) ? statSync(entry.artifactPath).size : 0);
	io.out(fmtOk(`Build ${entry.hash.slice(0, 12)} (${entry.mode}, ${entry.target})`));
	io.out(fmtOk(`Library: ${library}`));
	io.out(fmtOk(`Disk usage: ${humanBytes(bytes)}`));
	io.out(fmtOk(`Created: ${new Date(entry.createdAt).toISOString()}`));
	io.out(fmtOk(`Last access: ${entry.lastAccessAt ? new Date(entry.lastAccessAt).toISOString() : 'n/a'}`));
	return 0;
}

/** Runs one CLI command and resolves with its exit code. */
export async function runCli(argv: string[], io: CliIo = consoleIo): Promise<number> {
	const [cmd, ...rest] = argv;

	if (!cmd || cmd === '-h' || cmd === '--help') {
		usage(io);
		return 0;
	}

	try {
		switch (cmd) {
			case 'build':
				return await cmdBuild(rest, io);
			case 'expand':
				return cmdExpand(rest, io);
			case 'targets':
				return cmdTargets(io);
			case 'doctor':
				return await cmdDoctor(io);
			case 'cache':
				return await cmdCache(rest, io);
			default:
				io.err(`Unknown command: ${cmd}`);
				usage(io);
				return 1;
		}
	} catch (e) {
		if (!(e instanceof ZigbindError)) throw e;
		if (e instanceof CompilerFailedError && e.diagnostics.length) {
			io.err(fmtFail(`${e.name}: zig exited with ${e.exitCode ?? 'a signal'}`));
			io.err(formatDiagnostics(e.diagnostics));
			return 1;
		}
		io.err(fmtFail(`${e.name}: ${e.message}`));
		return 1;
	}
}
