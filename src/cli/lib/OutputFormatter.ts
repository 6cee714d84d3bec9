/**
 * Output Formatter
 *
 * Prints command results as text or JSON. Results go to stdout, failures to stderr.
 */

import chalk from 'chalk';
import { SendResult } from '../types/index.js';

/**
 * Show HL7 segments (separated by CR) one per line
 */
export function formatSegments(message: string): string {
  return message.replace(/\r\n?/g, '\n');
}

/**
 * Format JSON with indentation
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export class OutputFormatter {
  private jsonMode: boolean;

  constructor(jsonMode: boolean = false) {
    this.jsonMode = jsonMode;
  }

  /**
   * Print the outcome of a send.
   */
  sendResult(result: SendResult): void {
    if (this.jsonMode) {
      console.log(formatJson(result));
      return;
    }

    if (result.success) {
      console.log(chalk.green('HL7 Message Sent'));
      console.log(chalk.bold('Response from server:'));
      console.log(formatSegments(result.response));
    } else {
      console.error(chalk.red(`Failed to send HL7 message: ${result.error}`));
    }
  }

  /**
   * Print the outcome of a connection check.
   */
  checkResult(host: string, port: number, reachable: boolean): void {
    if (this.jsonMode) {
      console.log(formatJson({ host, port, reachable }));
    } else if (reachable) {
      console.log(chalk.green('✔') + ` ${host}:${port} is accepting connections`);
    } else {
      console.error(chalk.red('✖') + ` ${host}:${port} is not accepting connections`);
    }
  }

  /**
   * Output data as a text block or as JSON
   */
  output(text: string, jsonData: unknown): void {
    console.log(this.jsonMode ? formatJson(jsonData) : text);
  }

  success(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  /**
   * Output error message
   */
  error(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message }));
    } else {
      console.error(chalk.red(message));
    }
  }
}

export default OutputFormatter;
