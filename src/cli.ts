#!/usr/bin/env node
/**
 * sqlchat CLI
 * Seed the sample table, inspect classification and retrieval, run the server.
 */

import { cac } from 'cac';
import Table from 'cli-table3';
import { loadConfig, loadDotenv, type Config } from './config.js';
import { createServices } from './services/index.js';
import { startServer } from './server.js';
import { seedDatabase } from './cli/seed-database.js';
import * as logger from './cli/logger.js';
import { configureLogger } from './utils/logger.js';

const cli = cac('sqlchat');

cli.version('1.0.0');
cli.help();

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function config(): Config {
  loadDotenv();
  const loaded = loadConfig();
  configureLogger(loaded);
  return loaded;
}

/**
 * sqlchat seed
 */
cli
  .command('seed', 'Create and fill your_table with sample data')
  .option('--rows <rows>', 'Number of rows to generate', { default: 5000 })
  .option('--path <path>', 'Database file (defaults to DATABASE_PATH)')
  .option('--seed <seed>', 'Faker seed for reproducible data')
  .action((options: { rows: number; path?: string; seed?: number }) => {
    try {
      const dbPath = options.path ?? config().DATABASE_PATH;
      const rows = Number(options.rows);
      logger.printBanner();
      logger.warn('If the server is running, stop it first to avoid SQLITE_BUSY errors.');

      const spinner = logger.spinner(`Generating ${rows.toLocaleString()} rows...`);
      const total = seedDatabase(dbPath, {
        rows,
        seed: options.seed === undefined ? undefined : Number(options.seed),
        onProgress: (completed) => {
          spinner.text = `Generating rows... ${completed.toLocaleString()}/${rows.toLocaleString()}`;
        },
      });
      spinner.succeed(`Generated ${rows.toLocaleString()} rows`);

      logger.successBox(`${dbPath}\n${total.toLocaleString()} rows in your_table`, 'Database Ready');
    } catch (error) {
      logger.error('Seeding failed', errorMessage(error));
      process.exit(1);
    }
  });

/**
 * sqlchat classify <text>
 */
cli
  .command('classify <text>', 'Show how a question is classified')
  .action(async (text: string) => {
    try {
      const { classifier } = createServices(config());
      const spinner = logger.spinner('Classifying...');
      const result = await classifier.classify(text);
      spinner.stop();

      const { layer1_analysis: analysis, layer2_decision: decision, layer3_config: retrieval } =
        result.debugInfo;

      logger.section('Layer 1: analysis');
      logger.row('intent', analysis.intent);
      logger.row('question type', analysis.question_type);
      logger.row('keywords', analysis.keywords.join(', ') || '-');
      logger.row('entities', JSON.stringify(analysis.entities));
      logger.row('confidence', analysis.confidence.toFixed(2));

      logger.section('Layer 2: relevance');
      logger.row('domain related', String(decision.is_domain_related), decision.is_domain_related);
      logger.row('requires retrieval', String(decision.requires_retrieval), decision.requires_retrieval);
      logger.row('reason', decision.reason || '-');

      logger.section('Layer 3: retrieval');
      logger.row('use retrieval', String(retrieval.use_retrieval), retrieval.use_retrieval);
      logger.row('method', retrieval.search_method);
      logger.row('result cap', String(retrieval.result_cap));
      logger.row('search query', retrieval.search_query || '-');
      logger.newline();
    } catch (error) {
      logger.error('Classification failed', errorMessage(error));
      process.exit(1);
    }
  });

/**
 * sqlchat search <text>
 */
cli
  .command('search <text>', 'Generate and run SQL for a question')
  .action(async (text: string) => {
    try {
      const { sqlService } = createServices(config());
      const spinner = logger.spinner('Generating SQL...');
      const result = await sqlService.search(text);
      spinner.succeed(`${result.rows.length} rows (${result.queryType})`);

      logger.section('Generated SQL');
      logger.code(result.sql, 'sql');
      if (result.totalCount !== null) {
        logger.info(`Total: ${result.totalCount}`);
      }

      const first = result.rows[0];
      if (first) {
        const columns = Object.keys(first);
        const table = new Table({ head: columns });
        for (const row of result.rows.slice(0, 20)) {
          table.push(columns.map((column) => String(row[column] ?? '')));
        }
        logger.section('Rows');
        console.log(table.toString());
      }

      logger.section('Context');
      console.log(sqlService.formatResultsForLlm(result.rows, result.queryType, result.totalCount));
      logger.newline();
    } catch (error) {
      logger.error('Search failed', errorMessage(error));
      process.exit(1);
    }
  });

/**
 * sqlchat serve
 */
cli
  .command('serve', 'Start the HTTP server')
  .option('-p, --port <port>', 'Server port (defaults to PORT)')
  .action(async (options: { port?: number }) => {
    try {
      const base = config();
      logger.printBanner();
      await startServer(options.port === undefined ? base : { ...base, PORT: Number(options.port) });
    } catch (error) {
      logger.error('Failed to start server', errorMessage(error));
      process.exit(1);
    }
  });

cli.parse();
