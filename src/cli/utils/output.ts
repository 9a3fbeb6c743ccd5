/**
 * コマンドの出力先
 *
 * テストでは収集用の実装に差し替える。
 */
export interface CommandOutput {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CommandOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};
