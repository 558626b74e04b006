import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import type { JobDto } from '@pr-sentinel/shared';
import { getJob, getLatestJob, listStuckJobs, setApiUrl } from '../api';
import { formatDuration, progressBar, statusColor } from '../format';

export const statusCommand = new Command('status')
  .description('Show a review job, the latest job of a pull request, or jobs that look stuck')
  .argument('[job-id]', 'Specific job ID to check')
  .option('--pr <id>', 'Show the latest job for a pull request')
  .option('--older-than <minutes>', 'Age in minutes after which a running job counts as stuck', '30')
  .action(async (jobId: string | undefined, options: { pr?: string; olderThan: string }) => {
    const parent = statusCommand.parent;
    if (parent?.opts().apiUrl) {
      setApiUrl(parent.opts().apiUrl);
    }

    const spinner = ora('Fetching job status...').start();

    try {
      if (jobId || options.pr) {
        const job = jobId ? await getJob(jobId) : await getLatestJob(options.pr ?? '');
        spinner.succeed('Job found');
        printJob(job);
        return;
      }

      const minutes = parseInt(options.olderThan, 10);
      if (!Number.isInteger(minutes) || minutes < 1) {
        throw new Error(`Invalid --older-than value: ${options.olderThan}`);
      }
      const { jobs, total } = await listStuckJobs(minutes);
      spinner.succeed(`Found ${total} jobs unfinished after ${minutes} minutes`);

      if (jobs.length === 0) {
        return;
      }

      const table = new Table({
        head: [chalk.cyan('ID'), chalk.cyan('Pull Request'), chalk.cyan('Status'), chalk.cyan('Progress'), chalk.cyan('Started')],
        colWidths: [40, 40, 12, 10, 25],
      });

      for (const job of jobs) {
        table.push([
          job.id,
          job.pullRequestId,
          statusColor(job.status)(job.status),
          `${job.progressPercent}%`,
          job.startedAt ? new Date(job.startedAt).toLocaleString() : chalk.gray('Not started'),
        ]);
      }

      console.log(table.toString());
      console.log();
      console.log(chalk.gray('Use `review status <job-id>` for detailed info'));
    } catch (error) {
      spinner.fail('Failed to fetch job status');
      console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
      process.exit(1);
    }
  });

export function printJob(job: JobDto): void {
  console.log();
  console.log(chalk.bold('Job Details'));
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`  ID:           ${job.id}`);
  console.log(`  Pull request: ${job.pullRequestId}`);
  console.log(`  Status:       ${statusColor(job.status)(job.status)}`);
  console.log(`  Progress:     ${progressBar(job.progressPercent)}`);
  if (job.progressMessage) {
    console.log(`  Stage:        ${job.progressMessage}`);
  }
  console.log(`  Files:        ${job.filesAnalyzed ?? '-'}`);
  console.log(`  Suggestions:  ${job.suggestionCount}`);
  console.log(`  Duration:     ${formatDuration(job.durationMs)}`);

  if (job.errorMessage) {
    console.log();
    console.log(chalk.red.bold('Error:'));
    console.log(`  ${job.errorMessage}`);
  }
}
