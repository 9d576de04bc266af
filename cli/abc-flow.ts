#!/usr/bin/env -S tsx
import { AbcFlowSeriesRun, summarizeSeries } from "../modules/abc/abc-flow-series";
import { AbcFlowParameterError } from "../modules/abc/errors";
import { createLogger } from "../modules/core/log";
import {
  ABC_FLOW_USAGE,
  createPercentReporter,
  parseAbcFlowArgs,
  resolveAbcFlowConfig,
} from "../tools/abc-flow-config";

async function main() {
  const args = parseAbcFlowArgs(process.argv.slice(2));
  if (args.help) {
    console.log(ABC_FLOW_USAGE);
    return;
  }

  const params = await resolveAbcFlowConfig(args);
  const log = args.quiet ? undefined : createLogger("abc-flow");
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("interrupted")));
  const run = new AbcFlowSeriesRun(params, {
    log,
    signal: controller.signal,
    onProgress: log ? createPercentReporter(log) : undefined,
  });
  const result = await run.run();
  console.log(summarizeSeries(result));
}

main().catch((err) => {
  if (err instanceof AbcFlowParameterError) {
    console.error(err.message);
    console.error(ABC_FLOW_USAGE);
    process.exit(2);
  }
  console.error(err);
  process.exit(1);
});
