/**
 * One analysis run from the command line, Markdown to stdout.
 *
 * Run: npx tsx scripts/run-analysis.ts --mode LENIENT --headlines-file news.txt
 */

import 'dotenv/config';
import { env } from '../src/config/env.js';
import { AppError, errorMessage } from '../src/common/errors.js';
import { createConsoleLogger } from '../src/common/logger.js';
import { createEtfStrategyModule, renderReportMarkdown } from '../src/modules/etf-strategy/index.js';
import { parseAnalysisArgs, readHeadlinesFile } from '../src/modules/etf-strategy/etf-strategy.cli.js';

async function main(): Promise<void> {
  const { request, headlinesFile } = parseAnalysisArgs(process.argv.slice(2));
  if (headlinesFile) {
    request.headlines = [...(request.headlines ?? []), ...readHeadlinesFile(headlinesFile)];
  }

  const etf = createEtfStrategyModule({ env, logger: createConsoleLogger('EtfStrategy', true) });
  try {
    const report = await etf.service.analyze(request);
    process.stdout.write(renderReportMarkdown(report));
  } finally {
    await etf.limiter.disconnect();
  }
}

main().catch((err: unknown) => {
  const code = err instanceof AppError ? err.code : 'ERROR';
  console.error(`[run-analysis] ${code}: ${errorMessage(err)}`);
  process.exit(1);
});
