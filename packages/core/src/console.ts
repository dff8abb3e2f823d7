/**
 * ConsoleOutput — the sink every rendering wrapper writes to.
 */

export interface ConsoleOutput {
  write(text: string, newline?: boolean): void;
  error(text: string, newline?: boolean): void;

  // Semantic output (all default newline=true)
  warn(text: string, newline?: boolean): void;
  info(text: string, newline?: boolean): void;
}
