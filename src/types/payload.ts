import { Metadata } from './post';

/**
 * Data handed to the template engine
 */
export type PayloadValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | Date
  | PayloadValue[]
  | Payload;

export interface Payload {
  [key: string]: PayloadValue;
}

/**
 * A layout template: `_layouts/<name>.html` with its own front matter
 */
export interface Layout {
  name: string;
  content: string;
  data: Metadata;
}

export type LayoutMap = ReadonlyMap<string, Layout>;
