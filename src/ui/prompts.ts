import { checkbox, select } from '@inquirer/prompts';

export interface Choice<T extends string> {
  name: string;
  value: T;
  description?: string;
  checked?: boolean;
}

export async function askSelect<T extends string>(message: string, choices: Choice<T>[]): Promise<T> {
  return select({ message, choices });
}

export async function askCheckbox<T extends string>(message: string, choices: Choice<T>[]): Promise<T[]> {
  return checkbox({ message, choices });
}
