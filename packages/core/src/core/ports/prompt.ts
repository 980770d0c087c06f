/**
 * Questions put to the user while a transfer runs: what to do about a name
 * that already exists, or whether to skip a file that cannot be written.
 */

export interface PromptChoice<T = string> {
  title: string;
  value: T;
  description?: string;
}

export interface PromptPort {
  confirm(message: string, initial?: boolean): Promise<boolean>;
  select<T>(message: string, choices: Array<PromptChoice<T>>, hint?: string): Promise<T>;
}
