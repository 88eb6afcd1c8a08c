/**
 * BibTeX citation record.
 *
 * An entry type and key plus a set of fields. Rendering sorts the fields
 * by key, so output does not depend on assignment order.
 */

import { parseIntegerLiteral, protectCapitals } from "../format.js";
import type { FieldValue } from "../types.js";

/**
 * Render a numeric value bare, or undefined when it must be braced.
 * Strings starting with "0" stay literal: "0120" is a page label, not 120.
 */
function formatInteger(value: FieldValue): string | undefined {
  if (typeof value === "number") {
    if (!Number.isInteger(value)) return undefined;
    return Number.isSafeInteger(value) ? String(value) : BigInt(value).toString();
  }
  if (value === "" || value.startsWith("0")) return undefined;
  const parsed = parseIntegerLiteral(value);
  return parsed !== undefined ? parsed.toString() : undefined;
}

/** Format one field value as it appears after `key = `. */
export function formatFieldValue(key: string, value: FieldValue): string {
  const integer = formatInteger(value);
  if (integer !== undefined) return integer;

  const text = String(value);
  if (key.toLowerCase() === "title") {
    return `{${protectCapitals(text)}}`;
  }
  return `{${text}}`;
}

export class BibtexRecord {
  private readonly fields = new Map<string, FieldValue>();

  constructor(
    readonly entryType: string,
    readonly entryId: string,
  ) {}

  set(key: string, value: FieldValue): this {
    this.fields.set(key, value);
    return this;
  }

  get(key: string): FieldValue | undefined {
    return this.fields.get(key);
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  delete(key: string): boolean {
    return this.fields.delete(key);
  }

  get size(): number {
    return this.fields.size;
  }

  /** Fields sorted by key. */
  entries(): Array<[string, FieldValue]> {
    return [...this.fields.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /** Field keys in rendering order. */
  keys(): string[] {
    return this.entries().map(([key]) => key);
  }

  /**
   * Render as BibTeX:
   *
   * ```
   * @article{nepusz10,
   *   author = {Nepusz, T.},
   *   year = 2010
   * }
   * ```
   */
  render(): string {
    const lines = this.entries().map(
      ([key, value]) => `  ${key} = ${formatFieldValue(key, value)},`,
    );
    const last = lines.at(-1);
    if (last !== undefined) {
      lines[lines.length - 1] = last.slice(0, -1);
    }
    return `@${this.entryType}{${this.entryId},\n${lines.join("\n")}\n}`;
  }

  toString(): string {
    return this.render();
  }
}
