import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { SuggestionResponse } from '@pr-sentinel/shared';
import { respondToSuggestion, setApiUrl } from '../api';

const PAST_TENSE: Record<SuggestionResponse, string> = {
  accept: 'accepted',
  reject: 'rejected',
  ignore: 'ignored',
};

function respondCommand(response: SuggestionResponse, description: string): Command {
  const command: Command = new Command(response)
    .description(description)
    .argument('<suggestion-id>', 'Suggestion ID')
    .option('-f, --feedback <text>', 'Feedback to record with the response')
    .action(async (id: string, options: { feedback?: string }) => {
      const parent = command.parent;
      if (parent?.opts().apiUrl) {
        setApiUrl(parent.opts().apiUrl);
      }

      const spinner = ora(`Recording ${response}...`).start();

      try {
        const suggestion = await respondToSuggestion(id, response, options.feedback);
        spinner.succeed(`Suggestion ${suggestion.id} ${PAST_TENSE[response]}`);
        if (suggestion.userFeedback) {
          console.log(chalk.gray(`  Feedback: ${suggestion.userFeedback}`));
        }
      } catch (error) {
        spinner.fail(`Failed to ${response} suggestion`);
        console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
        process.exit(1);
      }
    });
  return command;
}

export const acceptCommand = respondCommand('accept', 'Accept a suggestion');
export const rejectCommand = respondCommand('reject', 'Reject a suggestion');
export const ignoreCommand = respondCommand('ignore', 'Dismiss a suggestion without judging it');
