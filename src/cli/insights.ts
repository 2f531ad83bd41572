#!/usr/bin/env node
/**
 * Session Insights CLI
 * init, refresh, status and show over the local metrics database
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import { DatabaseManager } from '../database/index.js';
import { InsightsEngine } from '../insights/InsightsEngine.js';
import { classifyQuery, runInsightsQuery } from '../insights/personal.js';
import type { InsightsQueryKind } from '../insights/personal.js';
import { SessionParser } from '../parser/SessionParser.js';
import type { ResolvedConfig, TimeRange } from '../types/index.js';
import { resolveConfig, saveConfigFile } from '../utils/config.js';
import { CONFIG_FILENAME, DEFAULT_INSIGHTS_QUERY, PACKAGE_NAME, PACKAGE_VERSION, TOP_TOOLS_LIMIT } from '../utils/constants.js';
import { formatDay } from '../utils/time.js';
import { validateTimeRange, validateWeeks } from '../utils/validation.js';

interface GlobalOptions {
  dataDir?: string;
  projectsDir?: string;
}

const SHOW_KEYWORDS = new Map<string, InsightsQueryKind>([
  ['weekly', 'weekly_summary'],
  ['summary', 'weekly_summary'],
  ['week', 'weekly_summary'],
  ['tools', 'tool_usage'],
  ['tool', 'tool_usage'],
  ['growth', 'growth'],
  ['improve', 'growth'],
  ['progress', 'growth'],
]);

const program = new Command();

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function fail(message: string, hint?: string): never {
  console.error(chalk.red(`\n${message}`));
  if (hint) console.error(chalk.dim(hint));
  console.error('');
  process.exit(1);
}

function getConfig(weeks?: string): ResolvedConfig {
  const globals = program.opts<GlobalOptions>();
  try {
    return resolveConfig({
      dataDir: globals.dataDir,
      projectsDir: globals.projectsDir,
      weeksToCompute: weeks === undefined ? undefined : validateWeeks(weeks),
    });
  } catch (error) {
    fail(`Invalid configuration: ${errorMessage(error)}`);
  }
}

/**
 * Open an existing database, exiting with a hint when it was never created
 */
function openExistingDatabase(config: ResolvedConfig): DatabaseManager {
  if (!existsSync(config.dbPath)) {
    fail(`No database found at ${config.dbPath}`, `Run "${PACKAGE_NAME} init" first.`);
  }
  return new DatabaseManager({ dataDir: config.dataDir, filename: config.dbFilename });
}

function printBanner(subtitle: string): void {
  console.log(boxen(
    chalk.cyan.bold('Session Insights') + chalk.white(` ${subtitle}`),
    {
      padding: { top: 0, bottom: 0, left: 1, right: 1 },
      margin: { top: 1, bottom: 1, left: 0, right: 0 },
      borderStyle: 'round',
      borderColor: 'cyan',
    }
  ));
}

program
  .name(PACKAGE_NAME)
  .description('Weekly usage metrics, growth trends and tips from your AI session logs')
  .version(PACKAGE_VERSION)
  .option('--data-dir <dir>', 'Directory holding the metrics database')
  .option('--projects-dir <dir>', 'Directory containing <project>/sessions/<id> logs');

// ==================
// INIT command
// ==================
program
  .command('init')
  .description('Create the metrics database')
  .action(() => {
    const config = getConfig();
    const existed = existsSync(config.dbPath);

    let db: DatabaseManager;
    try {
      db = new DatabaseManager({ dataDir: config.dataDir, filename: config.dbFilename });
    } catch (error) {
      fail(`Failed to create database: ${errorMessage(error)}`);
    }
    db.close();

    const configPath = join(config.dataDir, CONFIG_FILENAME);
    const wroteConfig = !existsSync(configPath);
    if (wroteConfig) {
      saveConfigFile(config.dataDir, {
        projectsDir: config.projectsDir,
        weeksToCompute: config.weeksToCompute,
      });
    }

    printBanner('Setup');
    if (existed) {
      console.log(chalk.green(`✓ Database already exists at ${config.dbPath}`));
    } else {
      console.log(chalk.green(`✓ Created database at ${config.dbPath}`));
    }
    if (wroteConfig) {
      console.log(chalk.green(`✓ Wrote ${configPath}`));
    }
    console.log(`${chalk.dim('Session logs:')} ${config.projectsDir}`);
    console.log(chalk.bold('\nNext steps:'));
    console.log(`  ${chalk.cyan(`${PACKAGE_NAME} refresh`)}  ${chalk.dim('import sessions and compute weekly metrics')}`);
    console.log(`  ${chalk.cyan(`${PACKAGE_NAME} show`)}     ${chalk.dim('see how your week is going')}\n`);
  });

// ==================
// REFRESH command
// ==================
program
  .command('refresh')
  .description('Parse session logs and recompute recent weekly metrics')
  .option('-w, --weeks <n>', 'Number of recent weeks to recompute')
  .action((options: { weeks?: string }) => {
    const config = getConfig(options.weeks);

    if (!existsSync(config.projectsDir)) {
      fail(`Projects directory not found: ${config.projectsDir}`, 'Pass --projects-dir or set SESSION_INSIGHTS_PROJECTS_DIR.');
    }

    const parser = new SessionParser();
    if (parser.findSessions(config.projectsDir).length === 0) {
      console.log(chalk.yellow(`\nNo sessions found under ${config.projectsDir}\n`));
      return;
    }

    const db = new DatabaseManager({ dataDir: config.dataDir, filename: config.dbFilename });
    const spinner = ora('Parsing sessions...').start();

    try {
      const engine = new InsightsEngine(db, { userId: config.userId });
      const result = engine.refresh(parser, config.projectsDir, {
        weeks: config.weeksToCompute,
        onProgress: (done, total) => {
          spinner.text = `Parsing sessions... ${done}/${total}`;
        },
      });

      spinner.succeed(chalk.green(`Processed ${result.processed} of ${result.found} sessions`));

      if (result.failures.length > 0) {
        console.log(chalk.yellow(`\n${result.failures.length} session(s) could not be parsed:`));
        for (const failure of result.failures) {
          console.log(`  ${chalk.dim(failure.session_dir)}: ${failure.error}`);
        }
      }

      console.log(chalk.dim(`\nRecomputed ${result.weeks_computed.length} week(s): ${result.weeks_computed.map(formatDay).join(', ')}\n`));
    } catch (error) {
      spinner.fail('Refresh failed');
      fail(`Error: ${errorMessage(error)}`);
    } finally {
      db.close();
    }
  });

// ==================
// STATUS command
// ==================
program
  .command('status')
  .description('Show what the database currently holds')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const config = getConfig();
    const db = openExistingDatabase(config);

    try {
      const sessionCount = db.getSessionCount();
      if (sessionCount === 0) {
        if (options.json) {
          console.log(JSON.stringify({ total_sessions: 0 }, null, 2));
        } else {
          console.log(chalk.yellow(`\nNo sessions stored yet. Run "${PACKAGE_NAME} refresh".\n`));
        }
        return;
      }

      const range = db.getSessionDateRange();
      const engine = new InsightsEngine(db, { userId: config.userId });
      const toolUsage = engine.queryToolUsage();
      const summary = engine.queryWeeklySummary();
      const topTools = toolUsage.top_tools.slice(0, TOP_TOOLS_LIMIT);

      if (options.json) {
        console.log(JSON.stringify({
          total_sessions: sessionCount,
          first_session: range ? formatDay(range.first) : null,
          last_session: range ? formatDay(range.last) : null,
          total_tool_calls: toolUsage.total_calls,
          unique_tools: toolUsage.unique_tools,
          top_tools: topTools,
          this_week: summary.summary,
        }, null, 2));
        return;
      }

      printBanner('Status');
      console.log(`${chalk.dim('Database:')}       ${config.dbPath}`);
      console.log(`${chalk.dim('Total sessions:')} ${sessionCount}`);
      if (range) {
        console.log(`${chalk.dim('First session:')}  ${formatDay(range.first)}`);
        console.log(`${chalk.dim('Last session:')}   ${formatDay(range.last)}`);
      }
      console.log(`${chalk.dim('Tool calls:')}     ${toolUsage.total_calls}`);
      console.log(`${chalk.dim('Unique tools:')}   ${toolUsage.unique_tools}`);

      if (topTools.length > 0) {
        console.log(chalk.bold('\nTop tools:'));
        topTools.forEach(([toolName, count], i) => {
          const share = toolUsage.total_calls > 0 ? Math.round((count / toolUsage.total_calls) * 100) : 0;
          console.log(`  ${chalk.cyan(`${i + 1}.`)} ${toolName} ${chalk.dim(`${count} calls (${share}%)`)}`);
        });
      }

      console.log(chalk.bold('\nThis week: ') + summary.summary + '\n');
    } catch (error) {
      fail(`Error: ${errorMessage(error)}`);
    } finally {
      db.close();
    }
  });

// ==================
// SHOW command
// ==================
program
  .command('show')
  .description('Answer a question about your usage (weekly, tools, growth, or free text)')
  .argument('[query]', 'Question or keyword', DEFAULT_INSIGHTS_QUERY)
  .option('-r, --range <range>', 'Week for the summary: this_week or last_week', 'this_week')
  .option('--json', 'Output as JSON')
  .action((query: string, options: { range: string; json?: boolean }) => {
    const config = getConfig();

    let timeRange: TimeRange;
    try {
      timeRange = validateTimeRange(options.range);
    } catch (error) {
      fail(errorMessage(error));
    }

    const db = openExistingDatabase(config);

    try {
      const engine = new InsightsEngine(db, { userId: config.userId });
      const kind = SHOW_KEYWORDS.get(query.trim().toLowerCase()) ?? classifyQuery(query);
      const result = runInsightsQuery(engine, kind, timeRange);

      if (options.json) {
        console.log(JSON.stringify(result.data, null, 2));
      } else {
        console.log(`\n${result.response}\n`);
      }
    } catch (error) {
      fail(`Error: ${errorMessage(error)}`);
    } finally {
      db.close();
    }
  });

program.parse();
