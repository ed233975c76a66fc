import { confirm, isCancel } from '@clack/prompts';

export type Prompter = {
  confirm(message: string): Promise<boolean>;
};

/** Interactive prompter; a cancelled prompt (Ctrl+C) answers no. */
export function createPrompter(): Prompter {
  return {
    async confirm(message) {
      const answer = await confirm({ message });
      if (isCancel(answer)) return false;
      return answer;
    },
  };
}
