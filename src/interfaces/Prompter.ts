/**
 * Line-oriented operator I/O used by the restore tool
 */
export interface Prompter {
  write(line: string): void;
  ask(question: string): Promise<string>;
  close(): void;
}
