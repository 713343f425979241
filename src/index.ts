#!/usr/bin/env node
import { EXIT_CODES, VOLBY_CONFIG } from './constants';
import { FetchError, InvalidUrlError, NoMunicipalitiesError } from './errors';
import { ElectionResultsScraper, failedCount, partyVotesOf, summariesOf } from './scraper';
import { buildResultTable, writeCsv } from './table';

function printUsage(): void {
  console.error('\n📖 Usage:');
  console.error('  election-results-scraper <list-url> <output.csv>');
  console.error('\n📋 Example:');
  console.error(`  election-results-scraper "${VOLBY_CONFIG.URLS.EXAMPLE_LIST}" results.csv`);
}

function isNetworkError(error: unknown): boolean {
  if (error instanceof FetchError) return true;
  // undici rejects with TypeError("fetch failed") or an AbortError/TimeoutError
  return (
    error instanceof Error &&
    (error.message === 'fetch failed' ||
      error.name === 'AbortError' ||
      error.name === 'TimeoutError')
  );
}

export async function main(args: string[], scraper?: ElectionResultsScraper): Promise<number> {
  const [listUrl, outputPath, ...rest] = args;
  if (!listUrl || !outputPath || rest.length > 0) {
    console.error('ERROR: Expected exactly two arguments: the list URL and the output CSV path.');
    printUsage();
    return EXIT_CODES.FAILURE;
  }

  const runner = scraper ?? new ElectionResultsScraper();
  try {
    const result = await runner.run(listUrl);
    const table = buildResultTable(summariesOf(result), partyVotesOf(result));
    await writeCsv(outputPath, table);

    const failed = failedCount(result);
    if (failed > 0) {
      console.error(`${failed} municipalities failed and were written as zeros`);
    }
    console.error(`Done! Results saved to ${outputPath}`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof InvalidUrlError || error instanceof NoMunicipalitiesError) {
      console.error(`ERROR: ${error.message}`);
    } else if (isNetworkError(error)) {
      console.error('ERROR: Network error:', error instanceof Error ? error.message : error);
    } else {
      console.error('ERROR:', error);
    }
    return EXIT_CODES.FAILURE;
  } finally {
    await runner.close();
  }
}

if (require.main === module) {
  process.once('SIGINT', () => {
    console.error('ERROR: Interrupted by user.');
    process.exit(EXIT_CODES.INTERRUPTED);
  });

  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('ERROR:', error);
      process.exitCode = EXIT_CODES.FAILURE;
    }
  );
}

export { ElectionResultsScraper } from './scraper';
export { isValidListUrl } from './validation';
export { parseNumber } from './parsing';
export { buildResultTable, formatCsv, writeCsv } from './table';
export * from './types';
