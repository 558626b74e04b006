import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { analyzePullRequest, getApiUrl, getJob, setApiUrl } from '../api';
import { isTerminal } from '../format';
import { printJob } from './status';

export const analyzeCommand = new Command('analyze')
  .description('Queue a review of a pull request and follow it to completion')
  .argument('<pull-request-id>', 'Pull request ID as stored by the review service')
  .option('--no-wait', 'Return as soon as the job is queued')
  .option('--timeout <seconds>', 'Give up waiting after this many seconds', '300')
  .action(async (pullRequestId: string, options: { wait: boolean; timeout: string }) => {
    const parent = analyzeCommand.parent;
    if (parent?.opts().apiUrl) {
      setApiUrl(parent.opts().apiUrl);
    }

    const spinner = ora('Queueing analysis...').start();

    try {
      const { jobId } = await analyzePullRequest(pullRequestId);

      if (!options.wait) {
        spinner.succeed(`Analysis queued as job ${jobId}`);
        return;
      }

      const maxWaitTime = parseInt(options.timeout, 10) * 1000;
      const pollInterval = 2000;
      const startTime = Date.now();
      let job = await getJob(jobId);

      while (!isTerminal(job.status)) {
        if (Date.now() - startTime > maxWaitTime) {
          throw new Error(`Job ${jobId} still ${job.status} after ${options.timeout}s`);
        }

        spinner.text = `${job.progressMessage ?? 'Waiting for a worker'}... ${job.progressPercent}%`;
        await new Promise((resolve) => setTimeout(resolve, pollInterval));
        job = await getJob(jobId);
      }

      if (job.status === 'failed') {
        spinner.fail('Analysis failed');
      } else {
        spinner.succeed(`Analysis complete with ${job.suggestionCount} suggestions`);
      }
      printJob(job);

      console.log();
      console.log(chalk.gray(`Use \`review suggestions ${jobId}\` to list them`));
      console.log(chalk.gray(`API: ${getApiUrl()}`));

      if (job.status === 'failed') {
        process.exit(1);
      }
    } catch (error) {
      spinner.fail('Analysis failed');
      console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
      process.exit(1);
    }
  });
