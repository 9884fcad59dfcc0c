#!/usr/bin/env node
/**
 * Renders bbox, highlight and annotation overlays of files/pi.pdf with each of the
 * three backends into approach1/, approach2/ and approach3/.
 */

import { OverlayBench } from './index.js';

async function main(): Promise<void> {
  const bench = new OverlayBench();
  let stage = '';

  const report = await bench.run((progress) => {
    const key = `${progress.approach ?? ''}:${progress.stage}`;
    if (key !== stage) {
      stage = key;
      console.log(`   ${progress.approach ? `[${progress.approach}] ` : ''}${progress.stage}: ${progress.message || progress.progress + '%'}`);
    }
  });

  for (const approach of report.approaches) {
    for (const output of approach.outputs) {
      console.log(`   ✓ ${output.path} (${(output.bytes / 1024).toFixed(1)} KB)`);
    }
  }

  if (report.failures.length > 0) {
    for (const failure of report.failures) {
      console.error(`   ✗ ${failure.approach}: ${failure.error}`);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Overlay generation failed:', error);
  process.exitCode = 1;
});
