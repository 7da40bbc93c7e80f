// Feed validation script: fetch every configured feed once and report what survives the filter
import * as fs from 'fs';
import { loadCrawlConfig } from './src/feeds/config.js';
import { validateFeeds, formatValidationReport } from './src/feeds/validation.js';

const REPORT_FILE = 'feed-validation-report.json';

async function main(): Promise<number> {
    const config = loadCrawlConfig();
    console.log(`Validating ${config.feeds.length} feeds...\n`);

    const report = await validateFeeds(config);
    for (const line of formatValidationReport(report)) console.log(line);

    fs.writeFileSync(REPORT_FILE, JSON.stringify(report, null, 2));
    console.log(`\nDetailed report saved to: ${REPORT_FILE}`);
    return report.summary.working > 0 ? 0 : 1;
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('Validation failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    });
