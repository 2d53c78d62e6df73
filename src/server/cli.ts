#!/usr/bin/env node
// ============================================================================
// SNAPSHOT CLI
// ============================================================================
// issue-extract <snapshot.html> [--out result.json] [--rows]
// Without --out the result lands beside the snapshot as <name>.issues.json.
// Runs the engine over a saved HTML page. A snapshot never grows, so the
// convergence loop is configured to give up after two idle iterations.

import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { JSDOM } from 'jsdom';
import { IssueExtractionEngine } from './scraper/IssueExtractionEngine.js';
import { DomPageHandle } from './page/DomPageHandle.js';
import { loadEngineConfigFromEnv } from './config/EngineConfig.js';
import { attachConsoleReporter } from './progress/ExtractionProgress.js';
import type { EngineConfigInput } from './config/EngineConfig.js';

const USAGE = 'Usage: issue-extract <snapshot.html> [--out result.json] [--rows]';

export const SNAPSHOT_CONFIG: EngineConfigInput = {
  timeouts: { readyMs: 2000 },
  convergence: {
    stagnationThreshold: 2,
    recoveryAttempts: 0,
    baseDelayMs: 0,
    stagnationStepMs: 0,
    rowDelayPerRowMs: 0,
    maxDelayMs: 0,
  },
  extraction: { pageSettleMs: 0 },
  retry: { retryDelay: 0 },
};

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      rows: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const input = positionals[0];
  if (values.help || !input) {
    console.log(USAGE);
    return input ? 0 : 1;
  }

  const html = await fs.promises.readFile(input, 'utf-8');
  const dom = new JSDOM(html, { url: `file://${path.resolve(input)}` });
  const page = new DomPageHandle(dom.window.document);

  const engine = new IssueExtractionEngine(page, { config: loadEngineConfigFromEnv(process.env, SNAPSHOT_CONFIG) });
  const detach = attachConsoleReporter(engine.progress, { rows: values.rows });

  try {
    const result = await engine.run();
    const output = JSON.stringify(
      { status: result.status, records: result.records, stats: result.stats, errors: result.errors },
      null,
      2
    );

    const outPath = values.out ?? `${input.replace(/\.html?$/i, '')}.issues.json`;
    await fs.promises.writeFile(outPath, output, 'utf-8');
    console.log(`[CLI] Wrote ${result.records.length} records to ${outPath}`);
    return result.status === 'empty' ? 2 : 0;
  } finally {
    detach();
    dom.window.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[CLI] ${message}`);
    process.exitCode = 1;
  });
