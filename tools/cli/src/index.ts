#!/usr/bin/env node
import { REPO_ROOT } from "@tribunal/config";
import { initOpenTelemetry, shutdownOpenTelemetry } from "@tribunal/engine";
import { run } from "./cli.js";

async function main(): Promise<number> {
  const traced = Boolean(process.env.OTEL_EXPORTER_OTLP_ENDPOINT);
  if (traced) await initOpenTelemetry("tribunal-cli");
  try {
    return await run(process.argv, REPO_ROOT);
  } finally {
    if (traced) await shutdownOpenTelemetry();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
