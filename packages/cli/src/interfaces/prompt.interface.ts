/**
 * Interactive prompts, injectable so handlers can be driven from tests.
 */

export interface PromptChoice<T> {
  name: string;
  value: T;
  /** Shown greyed out with this reason when set */
  disabled?: string;
}

export interface IPromptService {
  /** False when stdin is not a terminal; prompts would hang */
  readonly interactive: boolean;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  select<T>(message: string, choices: PromptChoice<T>[]): Promise<T>;
  input(message: string, options?: InputOptions): Promise<string>;
}

export interface InputOptions {
  default?: string;
  /** Returns an error message, or true when the value is acceptable */
  validate?: (value: string) => true | string;
}
