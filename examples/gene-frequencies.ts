#!/usr/bin/env -S npx tsx
/**
 * Gene frequency walkthrough
 *
 * Resolves a gene to its interval, pages through every overlapping
 * frequency record and prints a short summary.
 *
 * Usage: npx tsx examples/gene-frequencies.ts [geneId]
 */

import { GeneFreqError, GeneFrequencyClient, summarizeRecords } from "../src";

async function main(geneId: string) {
  const client = new GeneFrequencyClient();

  console.log(`\nResolving gene ${geneId}...`);
  const location = await client.locator.resolve(geneId);
  console.log(`  ${location.accession}:${location.start}-${location.stop}`);

  console.log("\nFetching overlapping frequency records...");
  const records = await client.paginator.fetchAll(location.accession, location.start, location.stop);
  const summary = summarizeRecords(records);
  console.log(`  ${summary.count} records`);
  if (summary.firstStart !== undefined && summary.lastEnd !== undefined) {
    console.log(`  covering ${summary.firstStart}-${summary.lastEnd}`);
  }

  const [firstKey] = records.keys();
  if (firstKey !== undefined) {
    console.log(`\nFirst record (${firstKey}):`);
    console.log(JSON.stringify(records.get(firstKey), null, 2));
  }
}

main(process.argv[2] ?? "672").catch((error: unknown) => {
  if (error instanceof GeneFreqError) {
    console.error(error.toString());
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
