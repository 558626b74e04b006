import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getStats, setApiUrl } from '../api';
import { formatDuration, formatRate } from '../format';

export const statsCommand = new Command('stats')
  .description('Show suggestion acceptance rate and average job duration')
  .action(async () => {
    const parent = statsCommand.parent;
    if (parent?.opts().apiUrl) {
      setApiUrl(parent.opts().apiUrl);
    }

    const spinner = ora('Fetching stats...').start();

    try {
      const stats = await getStats();
      spinner.stop();

      console.log(chalk.bold('Review Stats'));
      console.log(chalk.gray('─'.repeat(50)));
      console.log(`  Acceptance rate:  ${formatRate(stats.acceptanceRate)}`);
      console.log(`  Average duration: ${formatDuration(stats.averageDurationMs)}`);
    } catch (error) {
      spinner.fail('Failed to fetch stats');
      console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
      process.exit(1);
    }
  });
