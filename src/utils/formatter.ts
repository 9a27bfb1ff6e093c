/**
 * Response formatting utility for Markdown and JSON output
 */

import { CONFIG } from '../config.js';
import type { OutputFormat } from '../types.js';

export class ResponseFormatter {
  /**
   * Format response based on output type
   */
  static format(data: unknown, format: OutputFormat = 'markdown'): string {
    const result = format === 'json'
      ? JSON.stringify(data, null, 2)
      : this.formatMarkdown(data);

    return this.truncate(result);
  }

  /**
   * Enforce the response character limit
   */
  static truncate(result: string): string {
    if (result.length <= CONFIG.CHARACTER_LIMIT) {
      return result;
    }

    const truncateAt = CONFIG.CHARACTER_LIMIT - 100;
    return result.substring(0, truncateAt) + '\n\n... [Response truncated due to length. Use format="json" for complete output]';
  }

  /**
   * Format data as Markdown
   */
  private static formatMarkdown(data: unknown): string {
    if (Array.isArray(data)) {
      return this.formatArray(data);
    } else if (isRecord(data)) {
      return this.formatObject(data);
    } else {
      return String(data);
    }
  }

  private static formatArray(items: unknown[]): string {
    if (items.length === 0) {
      return '*No items found*';
    }

    return items.map(item => `- ${this.formatValue(item)}`).join('\n');
  }

  private static formatObject(obj: Record<string, unknown>): string {
    const lines: string[] = [];

    for (const [key, value] of Object.entries(obj)) {
      if (Array.isArray(value) && value.length > 0) {
        lines.push(`**${this.titleCase(key)}**:`);
        lines.push(this.formatArray(value));
        continue;
      }
      lines.push(`**${this.titleCase(key)}**: ${this.formatValue(value)}`);
    }

    return lines.join('\n');
  }

  /**
   * Format a single value for display
   */
  private static formatValue(value: unknown, maxLength = 200): string {
    if (value === null || value === undefined) {
      return '-';
    }

    if (typeof value === 'boolean') {
      return value ? '✓' : '✗';
    }

    let str = typeof value === 'object' ? JSON.stringify(value) : String(value);

    if (str.length > maxLength) {
      str = str.substring(0, maxLength - 3) + '...';
    }

    return str;
  }

  /**
   * Convert string to title case
   */
  private static titleCase(str: string): string {
    return str
      .replace(/([A-Z])/g, ' $1') // Add space before capitals
      .replace(/^./, s => s.toUpperCase())
      .replace(/_/g, ' ')
      .trim();
  }

  /**
   * Format success message
   */
  static success(message: string, data?: unknown): string {
    let result = `✅ **Success**: ${message}\n\n`;

    if (data !== undefined) {
      result += this.formatMarkdown(data);
    }

    return this.truncate(result);
  }

  /**
   * Format error message
   */
  static error(message: string, suggestion?: string): string {
    let result = `❌ **Error**: ${message}\n\n`;

    if (suggestion) {
      result += `💡 **Suggestion**: ${suggestion}`;
    }

    return result;
  }

  /**
   * Format warning message
   */
  static warning(message: string): string {
    return `⚠️ **Warning**: ${message}`;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
