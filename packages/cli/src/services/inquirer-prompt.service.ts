import inquirer from "inquirer";
import type { IPromptService, InputOptions, PromptChoice } from "../interfaces/prompt.interface";

export class InquirerPromptService implements IPromptService {
  readonly interactive = process.stdin.isTTY === true;

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: "confirm",
        name: "confirmed",
        message,
        default: defaultValue,
      },
    ]);
    return confirmed;
  }

  async select<T>(message: string, choices: PromptChoice<T>[]): Promise<T> {
    const { selected } = await inquirer.prompt<{ selected: T }>([
      {
        type: "list",
        name: "selected",
        message,
        pageSize: 15,
        choices: choices.map((choice) => ({
          name: choice.name,
          value: choice.value,
          disabled: choice.disabled ?? false,
        })),
      },
    ]);
    return selected;
  }

  async input(message: string, options: InputOptions = {}): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: "input",
        name: "value",
        message,
        default: options.default,
        validate: (input: string) => (options.validate ? options.validate(input.trim()) : true),
      },
    ]);
    return value.trim();
  }
}
