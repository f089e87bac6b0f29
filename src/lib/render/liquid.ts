/**
 * Liquid template engine with the date and text filters blog layouts use
 */

import { Liquid } from 'liquidjs';
import { Payload } from '../../types/payload';
import { TemplateEngine } from './templateEngine';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

/**
 * "05 Nov 2008"
 */
export function dateToString(value: unknown): string {
  const date = toDate(value);
  if (!date) {
    return String(value ?? '');
  }
  return `${pad(date.getDate())} ${MONTHS[date.getMonth()]} ${date.getFullYear()}`;
}

/**
 * Local time in XML Schema form, e.g. "2008-11-05T14:30:00+01:00"
 */
export function dateToXmlSchema(value: unknown): string {
  const date = toDate(value);
  if (!date) {
    return String(value ?? '');
  }

  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? '+' : '-';
  const zone = `${sign}${pad(Math.floor(Math.abs(offset) / 60))}:${pad(Math.abs(offset) % 60)}`;

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}${zone}`
  );
}

export function xmlEscape(value: unknown): string {
  return String(value ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function numberOfWords(value: unknown): number {
  return String(value ?? '')
    .split(/\s+/)
    .filter((word) => word.length > 0).length;
}

/**
 * ["a", "b", "c"] -> "a, b, and c"
 */
export function arrayToSentenceString(value: unknown): string {
  if (!Array.isArray(value)) {
    return String(value ?? '');
  }
  const words = value.map((entry) => String(entry));
  switch (words.length) {
    case 0:
      return '';
    case 1:
      return words[0];
    case 2:
      return `${words[0]} and ${words[1]}`;
    default:
      return `${words.slice(0, -1).join(', ')}, and ${words[words.length - 1]}`;
  }
}

export class LiquidTemplateEngine implements TemplateEngine {
  private readonly liquid: Liquid;

  constructor(liquid: Liquid = new Liquid()) {
    this.liquid = liquid;
    this.liquid.registerFilter('date_to_string', dateToString);
    this.liquid.registerFilter('date_to_xmlschema', dateToXmlSchema);
    this.liquid.registerFilter('xml_escape', xmlEscape);
    this.liquid.registerFilter('number_of_words', numberOfWords);
    this.liquid.registerFilter('array_to_sentence_string', arrayToSentenceString);
  }

  async render(template: string, payload: Payload): Promise<string> {
    return this.liquid.parseAndRender(template, payload);
  }
}
