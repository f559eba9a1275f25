#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for paper2video.
 * Checks API keys, configuration values, the ffmpeg/poppler binaries, the
 * overlay font and the temp directory.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { accessSync, constants, existsSync, mkdirSync } from 'fs';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    const display = value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
    pass(label, display);
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value ?? defaultVal;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

function checkBinary(bin: string, versionArgs: string[], hint: string): void {
  try {
    const out = execFileSync(bin, versionArgs, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(bin, out.split('\n')[0]?.trim() ?? '');
  } catch (err) {
    // pdftotext -v prints to stderr and exits 0 or 99 depending on version
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    const stderr = err instanceof Error && 'stderr' in err && typeof err.stderr === 'string'
      ? err.stderr.split('\n')[0]?.trim()
      : undefined;
    if (!missing && stderr) {
      pass(bin, stderr);
      return;
    }
    fail(bin, hint);
    anyRequiredFailed = true;
  }
}

// ── Section: API keys ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== paper2video: pre-flight check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] API keys${RESET}`);

checkRequired('ANTHROPIC_API_KEY', process.env['ANTHROPIC_API_KEY'], 'Get from https://console.anthropic.com');
checkRequired('OPENAI_API_KEY',    process.env['OPENAI_API_KEY'],    'Get from https://platform.openai.com/api-keys');

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Configuration${RESET}`);

checkOptional('LLM_MODEL',         process.env['LLM_MODEL'],         'claude-sonnet-4-6');
checkOptional('TTS_MODEL',         process.env['TTS_MODEL'],         'tts-1');
checkOptional('TTS_VOICE',         process.env['TTS_VOICE'],         'alloy');
checkOptional('TARGET_SCENES',     process.env['TARGET_SCENES'],     '5');
checkOptional('MAX_CONCURRENCY',   process.env['MAX_CONCURRENCY'],   '3');
checkOptional('SYNTHESIS_RETRIES', process.env['SYNTHESIS_RETRIES'], '2');
checkOptional('DEFAULT_ASPECT',    process.env['DEFAULT_ASPECT'],    'landscape');
checkOptional('OUTPUT_DIR',        process.env['OUTPUT_DIR'],        './output');
checkOptional('LOG_LEVEL',         process.env['LOG_LEVEL'],         'info');

// Full schema validation, with the same messages the CLI would give
try {
  const { loadEnv } = await import('../src/config.js');
  loadEnv();
  pass('environment schema');
} catch (err) {
  fail('environment schema', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Section: Binaries ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Media tools${RESET}`);

checkBinary('ffmpeg',    ['-version'], 'Install ffmpeg (apt install ffmpeg / brew install ffmpeg)');
checkBinary('ffprobe',   ['-version'], 'ffprobe ships with ffmpeg');
checkBinary('pdftotext', ['-v'],       'Install poppler-utils (apt install poppler-utils / brew install poppler)');
checkBinary('pdfimages', ['-v'],       'Install poppler-utils (apt install poppler-utils / brew install poppler)');

// ── Section: Files ────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Files and directories${RESET}`);

const fontFile = process.env['FONT_FILE'] ?? '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf';
if (existsSync(fontFile)) {
  pass('FONT_FILE', fontFile);
} else {
  fail('FONT_FILE', `Not found: ${fontFile}. Install fonts-dejavu-core or point FONT_FILE at a .ttf`);
  anyRequiredFailed = true;
}

const tempDir = process.env['TEMP_DIR'] ?? '/tmp/paper2video';
try {
  mkdirSync(tempDir, { recursive: true });
  accessSync(tempDir, constants.W_OK);
  pass('TEMP_DIR writable', tempDir);
} catch (err) {
  fail('TEMP_DIR writable', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start -- run 2401.06015${RESET}\n`);
}
