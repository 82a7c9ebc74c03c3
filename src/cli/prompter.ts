import inquirer from "inquirer";

export interface Choice<T extends string> {
  name: string;
  value: T;
}

/** Everything the CLI asks the operator goes through this seam. */
export interface Prompter {
  input(message: string): Promise<string>;
  select<T extends string>(message: string, choices: Choice<T>[]): Promise<T>;
}

export class InquirerPrompter implements Prompter {
  async input(message: string): Promise<string> {
    const answers = await inquirer.prompt<{ value: string }>([
      { type: "input", name: "value", message },
    ]);
    return answers.value;
  }

  async select<T extends string>(
    message: string,
    choices: Choice<T>[]
  ): Promise<T> {
    const answers = await inquirer.prompt<{ value: T }>([
      { type: "list", name: "value", message, choices },
    ]);
    return answers.value;
  }
}
