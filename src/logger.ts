import chalk from "chalk";

function timestamp(): string {
  const now = new Date();
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
}

export class Logger {
  private static debugEnabled = false;

  static setDebug(enabled: boolean): void {
    Logger.debugEnabled = enabled;
  }

  static info(message: string): void {
    console.log(chalk.green(`[${timestamp()}] ${message}`));
  }

  static plain(message: string): void {
    console.log(chalk.green(message));
  }

  static success(message: string): void {
    console.log(chalk.green(`[${timestamp()}] ✅ ${message}`));
  }

  static warn(message: string): void {
    console.log(chalk.yellow(`⚠️  ${message}`));
  }

  static error(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }

  static step(step: number, total: number, message: string): void {
    console.log(chalk.cyan(`[${timestamp()}] [${step}/${total}] ${message}`));
  }

  static debug(message: string): void {
    if (!Logger.debugEnabled) return;
    console.error(chalk.gray(`+ ${message}`));
  }
}
