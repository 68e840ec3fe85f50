/**
 * Scanline — Run Pipeline Script
 *
 * Promotion sweep → history index → topic scans → dedup → synthesis → daily note
 *
 * Usage:
 *   npm run pipeline                      # Full run
 *   npm run pipeline -- --topic agents    # One topic
 *   npm run pipeline -- --preview         # Everything except writes
 *   npm run pipeline -- --promote-only    # Resolve tags only
 */

import 'dotenv/config';
import path from 'node:path';
import { loadConfig } from '../src/lib/config';
import { errorMessage, logger } from '../src/lib/logger';
import { FileSystemCorpus } from '../src/corpus';
import { createSources } from '../src/feeds/sources';
import { JsonlRecordStore } from '../src/feedback';
import { createSynthesizer } from '../src/delivery';
import { RunCoordinator, UsageError, USAGE, parseArgs } from '../src/pipeline';
import type { RunSummary } from '../src/pipeline';

function printSummary(summary: RunSummary): void {
  console.log('\n' + '='.repeat(60));
  console.log(`SCANLINE RUN ${summary.runId} (${summary.mode})`);
  console.log('='.repeat(60));

  if (summary.promotion) {
    const p = summary.promotion;
    console.log(
      `Promotions: ${p.promotions}  Feedback: ${p.feedback}  ` +
        `Already promoted: ${p.alreadyPromoted}  Conflicts: ${p.conflicts.length}`
    );
    p.conflicts.forEach(c => console.log(`  ! ${c}`));
  }

  for (const t of summary.tracks) {
    const status = t.failed ? ' FAILED' : '';
    console.log(
      `${t.track.padEnd(14)} fetched ${t.fetched}, kept ${t.kept} ` +
        `(spam ${t.spam}, below floor ${t.belowFloor}, duplicate ${t.duplicates})${status}`
    );
    t.errors.forEach(e => console.log(`  ! ${e}`));
  }

  if (summary.tracks.length > 0) {
    console.log(
      `Dropped: spam ${summary.drops.spam}, engagement-floor ${summary.drops['engagement-floor']}, ` +
        `duplicate ${summary.drops.duplicate}`
    );
    console.log(`Reading list: ${summary.readingList} items (synthesis: ${summary.synthesizer ?? 'none'})`);
  }
  if (summary.notePath) {
    console.log(`Wrote ${summary.notePath}`);
  }
  if (summary.fatal) {
    console.log(`FAILED at ${summary.fatal.stage}: ${summary.fatal.error}`);
  }

  console.log(`Duration: ${(summary.durationMs / 1000).toFixed(2)}s`);
  console.log('='.repeat(60) + '\n');
}

async function runPipeline(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = await loadConfig(options.configPath);

  const coordinator = new RunCoordinator(config, {
    corpus: new FileSystemCorpus(config.run.corpusPath),
    sources: createSources(config),
    store: new JsonlRecordStore(path.resolve(config.run.stateDir)),
    synthesizer: createSynthesizer(config),
  });

  const summary = await coordinator.run(options.mode);

  if (summary.preview) {
    console.log(summary.preview);
  }
  printSummary(summary);

  return summary.fatal ? 1 : 0;
}

runPipeline()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else {
      logger.error('Pipeline failed', { error: errorMessage(error) });
      console.error('\nPipeline failed:', errorMessage(error));
    }
    process.exitCode = 1;
  });
