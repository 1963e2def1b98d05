import { ConfigurationError, type Prompter } from '@pve-forge/shared';

/** True for the answers that let a confirmation through */
export function isAffirmative(answer: string): boolean {
  const trimmed = answer.trim();
  return trimmed === 'y' || trimmed === 'Y';
}

async function ask(question: string, mask?: string): Promise<string> {
  if (!process.stdin.isTTY) {
    throw new ConfigurationError(
      `Cannot ask "${question}" without a terminal. Pass the value as a flag or use --assumeyes.`,
    );
  }

  const { render } = await import('ink');
  const { createElement } = await import('react');
  const { Prompt } = await import('./Prompt.js');

  let answer = '';
  const { waitUntilExit } = render(
    createElement(Prompt, {
      question,
      ...(mask !== undefined ? { mask } : {}),
      onSubmit: (value: string) => {
        answer = value;
      },
    }),
  );
  await waitUntilExit();
  return answer;
}

/** Prompter backed by ink text inputs */
export function createInkPrompter(): Prompter {
  return {
    confirm: async (question) => isAffirmative(await ask(question)),
    text: (question) => ask(question),
    secret: (question) => ask(question, '*'),
  };
}
