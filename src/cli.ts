import * as http from 'http';
import type { CrawlConfig } from './types/index.js';
import { loadCrawlConfig } from './feeds/config.js';
import type { CrawlDeps } from './feeds/pipeline.js';
import { buildStaticReport } from './build/static.js';
import { createRequestHandler } from './server/endpoints.js';
import { log } from './server/logging.js';

export const USAGE = `Usage: stormfeed [--build-static [--out <dir>]] [--help]

  (no flags)        serve /crawl, /summary, /report and /health on $PORT
  --build-static    crawl once, write news_report.html and news_data.json
  --out <dir>       output directory for --build-static (default $OUTPUT_DIR or cwd)`;

export interface CliDeps extends CrawlDeps {
    env?: NodeJS.ProcessEnv;
    loadConfig?: (env: NodeJS.ProcessEnv) => CrawlConfig;
    print?: (line: string) => void;
    printError?: (line: string) => void;
}

export interface CliOptions {
    mode: 'serve' | 'build-static' | 'help';
    outDir?: string;
}

export function parseArgs(args: readonly string[]): CliOptions {
    const options: CliOptions = { mode: 'serve' };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            return { mode: 'help' };
        } else if (arg === '--build-static') {
            options.mode = 'build-static';
        } else if (arg === '--out') {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                throw new Error('--out needs a directory');
            }
            options.outDir = value;
            i++;
        } else {
            throw new Error(`Unknown argument: ${arg}`);
        }
    }
    if (options.outDir !== undefined && options.mode !== 'build-static') {
        throw new Error('--out only applies to --build-static');
    }
    return options;
}

export function startServer(config: CrawlConfig, deps: CrawlDeps = {}): Promise<http.Server> {
    const handler = createRequestHandler(config, deps);
    const server = http.createServer((req, res) => {
        handler(req, res).catch((error: unknown) => {
            log('error', 'Unhandled request failure', { error: String(error) });
            if (!res.headersSent) res.writeHead(500);
            res.end();
        });
    });

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, () => {
            server.off('error', reject);
            const address = server.address();
            const port = address !== null && typeof address === 'object' ? address.port : config.port;
            log('info', 'Server started successfully', { port, feeds: config.feeds.length });
            resolve(server);
        });
    });
}

async function runBuildStatic(config: CrawlConfig, outDir: string | undefined, deps: CliDeps): Promise<number> {
    const print = deps.print ?? console.log;
    const printError = deps.printError ?? console.error;
    try {
        const result = await buildStaticReport(config, outDir ?? config.outputDir, { httpGet: deps.httpGet, now: deps.now });
        if (result.crawlFailed) {
            printError('Crawl failed: no feed could be fetched');
            return 1;
        }
        print(`HTML: ${result.htmlPath}`);
        print(`JSON: ${result.jsonPath}`);
        return 0;
    } catch (error) {
        log('error', 'Static build failed', {
            error: String(error),
            stack: error instanceof Error ? error.stack : undefined
        });
        printError(`Build failed: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}

/**
 * Entry point shared by the `stormfeed` binary and tests. Resolves with the
 * process exit code; in serve mode that happens once the server has closed.
 */
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
    const print = deps.print ?? console.log;
    const printError = deps.printError ?? console.error;

    let options: CliOptions;
    try {
        options = parseArgs(args);
    } catch (error) {
        printError(error instanceof Error ? error.message : String(error));
        printError(USAGE);
        return 2;
    }
    if (options.mode === 'help') {
        print(USAGE);
        return 0;
    }

    let config: CrawlConfig;
    try {
        config = (deps.loadConfig ?? loadCrawlConfig)(deps.env ?? process.env);
    } catch (error) {
        log('error', 'Configuration error', { error: String(error) });
        printError(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }

    if (options.mode === 'build-static') {
        return runBuildStatic(config, options.outDir, deps);
    }

    const server = await startServer(config, { httpGet: deps.httpGet, now: deps.now });
    print(`Winter storm feed running at http://localhost:${config.port}`);

    return new Promise<number>(resolve => {
        const shutdown = (signal: NodeJS.Signals) => {
            log('info', `Server shutting down (${signal})`);
            server.close(() => resolve(0));
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    });
}
