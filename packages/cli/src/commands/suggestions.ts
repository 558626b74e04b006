import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { listSuggestions, setApiUrl } from '../api';
import { formatLocation, severityColor, statusColor, truncatePath } from '../format';

interface SuggestionsOptions {
  status?: string;
  severity?: string;
  minConfidence?: string;
  verbose?: boolean;
}

export const suggestionsCommand = new Command('suggestions')
  .description('List the suggestions produced by a review job')
  .argument('<job-id>', 'Review job ID')
  .option('-s, --status <status>', 'Filter by status (pending, accepted, rejected, ignored)')
  .option('--severity <severity>', 'Filter by severity (critical, moderate, minor)')
  .option('-c, --min-confidence <score>', 'Only show suggestions at or above this confidence')
  .option('-v, --verbose', 'Print explanations and suggested fixes')
  .action(async (jobId: string, options: SuggestionsOptions) => {
    const parent = suggestionsCommand.parent;
    if (parent?.opts().apiUrl) {
      setApiUrl(parent.opts().apiUrl);
    }

    const spinner = ora('Fetching suggestions...').start();

    try {
      const minConfidence = options.minConfidence === undefined ? undefined : Number(options.minConfidence);
      if (minConfidence !== undefined && Number.isNaN(minConfidence)) {
        throw new Error(`Invalid --min-confidence value: ${options.minConfidence}`);
      }

      const { suggestions, total } = await listSuggestions(jobId, {
        status: options.status,
        severity: options.severity,
        minConfidence,
      });
      spinner.succeed(`Found ${total} suggestions`);

      if (suggestions.length === 0) {
        return;
      }

      const table = new Table({
        head: [chalk.cyan('ID'), chalk.cyan('Location'), chalk.cyan('Severity'), chalk.cyan('Confidence'), chalk.cyan('Status'), chalk.cyan('Message')],
        colWidths: [38, 32, 10, 12, 10, 40],
        wordWrap: true,
      });

      for (const s of suggestions) {
        table.push([
          s.id,
          truncatePath(formatLocation(s.filePath, s.lineNumber, s.lineEnd), 30),
          severityColor(s.severity)(s.severity),
          `${s.confidenceScore.toFixed(0)}`,
          statusColor(s.status)(s.status),
          s.message,
        ]);
      }

      console.log(table.toString());

      if (options.verbose) {
        for (const s of suggestions) {
          console.log();
          console.log(chalk.bold(`${formatLocation(s.filePath, s.lineNumber, s.lineEnd)} [${s.category}]`));
          console.log(`  ${s.explanation}`);
          if (s.suggestedFix) {
            console.log(chalk.green(s.suggestedFix.replace(/^/gm, '  ')));
          }
        }
      }

      console.log();
      console.log(chalk.gray('Use `review accept <id>` or `review reject <id>` to respond'));
    } catch (error) {
      spinner.fail('Failed to fetch suggestions');
      console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
      process.exit(1);
    }
  });
