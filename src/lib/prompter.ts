import { createInterface } from 'node:readline/promises';
import process from 'node:process';

interface InputPromptOptions {
  defaultValue?: string;
  required?: boolean;
  allowEmpty?: boolean;
  validate?: (value: string) => string | null;
}

interface SelectChoice {
  label: string;
  value: string;
}

interface SelectPromptOptions {
  defaultValue?: string;
}

export async function promptInput(question: string, options: InputPromptOptions = {}): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (true) {
      const suffix = options.defaultValue ? ` [${options.defaultValue}]` : '';
      const answer = await rl.question(`${question}${suffix}: `);
      const raw = answer.trim();
      const value = raw === '' && options.defaultValue !== undefined ? options.defaultValue : raw;

      if (!value && options.required && !options.allowEmpty) {
        console.log('A value is required.');
        continue;
      }

      if (options.validate) {
        const error = options.validate(value);
        if (error) {
          console.log(error);
          continue;
        }
      }

      return value;
    }
  } finally {
    rl.close();
  }
}

export async function promptSelect(
  question: string,
  choices: SelectChoice[],
  options: SelectPromptOptions = {},
): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (true) {
      console.log(question);
      choices.forEach((choice, index) => {
        console.log(`  ${index + 1}) ${choice.label}`);
      });
      const prompt = options.defaultValue ? `Select option [${options.defaultValue}]: ` : 'Select option: ';
      const answer = await rl.question(prompt);
      const trimmed = answer.trim();

      if (trimmed === '' && options.defaultValue !== undefined) {
        return options.defaultValue;
      }

      const numeric = Number.parseInt(trimmed, 10);
      const byIndex = Number.isNaN(numeric) ? undefined : choices[numeric - 1];
      if (byIndex) {
        return byIndex.value;
      }

      const exactMatch = choices.find((choice) => choice.value === trimmed || choice.label === trimmed);
      if (exactMatch) {
        return exactMatch.value;
      }

      console.log('Invalid selection. Please try again.');
    }
  } finally {
    rl.close();
  }
}
