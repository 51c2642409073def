#!/usr/bin/env node
// CLI entry point for dedupe-scanner
// The .env file is loaded before any module that reads configuration.

async function main(): Promise<void> {
  const { loadEnv } = await import('./config/env.js');
  const { projectRoot } = await import('./config/registry/parsers.js');
  loadEnv(projectRoot);

  let failure: unknown;
  try {
    // Configuration is validated on import
    const { runCli } = await import('./cli/index.js');
    await runCli(process.argv.slice(2));
    return;
  } catch (error) {
    failure = error;
  }

  try {
    const { handleCliError } = await import('./cli/utils/errors.js');
    handleCliError(failure);
  } catch {
    // The error mapper needs a valid configuration; report the raw failure
    const message = failure instanceof Error ? failure.message : String(failure);
    console.error(JSON.stringify({ error: message }, null, 2));
    process.exit(2);
  }
}

void main();
