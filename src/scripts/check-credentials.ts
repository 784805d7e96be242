#!/usr/bin/env tsx
// ---------------------------------------------------------------------------
// check-credentials: verify Qualtrics credentials and list surveys.
//
// Usage:
//   npx tsx src/scripts/check-credentials.ts [options]
//
// Options:
//   --config <path>   YAML config file (default: $QUALTRICS_CONFIG)
//   --surveys         Also list the account's surveys
//   --json            Output results as JSON (for CI/scripting)
// ---------------------------------------------------------------------------

import { QualtricsClient } from "../client/qualtrics-client.js";
import { clientOptionsFromConfig, loadConfig } from "../config/config.js";
import { QualtricsClientError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";

// ── CLI argument parsing ─────────────────────────────────────────────────

interface CliOptions {
  config?: string;
  surveys: boolean;
  json: boolean;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const opts: CliOptions = { surveys: false, json: false };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--config":
        opts.config = args[++i];
        break;
      case "--surveys":
        opts.surveys = true;
        break;
      case "--json":
        opts.json = true;
        break;
      case "--help":
        console.log(`
Usage: npx tsx src/scripts/check-credentials.ts [options]

Options:
  --config <path>   YAML config file (default: $QUALTRICS_CONFIG)
  --surveys         Also list the account's surveys
  --json            Output results as JSON (for CI/scripting)
  --help            Show this help message

Credentials may also come from QUALTRICS_USERNAME, QUALTRICS_TOKEN and
QUALTRICS_LIBRARY_ID.
`);
        process.exit(0);
    }
  }

  return opts;
}

// ── Main ─────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const opts = parseArgs();
  const config = loadConfig({ configPath: opts.config });
  const logger = createLogger(config.logging);

  // getUserInfo doubles as the credential check.
  const client = new QualtricsClient(clientOptionsFromConfig(config, logger));
  const userInfo = await client.getUserInfo();
  const surveys = opts.surveys ? await client.getSurveys() : undefined;

  if (opts.json) {
    console.log(JSON.stringify({ ok: true, userInfo, surveys }, null, 2));
    return;
  }

  console.log(`\n  Credentials for ${config.credentials.username} are valid.`);
  console.log(`  Default library: ${client.hasLibrary() ? config.credentials.libraryId : "(none)"}`);
  if (surveys) {
    console.log(`  Surveys: ${surveys.length}`);
  }
  console.log();
}

main().catch((err: unknown) => {
  if (err instanceof QualtricsClientError) {
    console.error(`${err.name}: ${err.message}`);
    process.exit(1);
  }
  console.error("Fatal error:", err);
  process.exit(2);
});
