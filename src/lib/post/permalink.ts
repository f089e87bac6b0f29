/**
 * Permalink resolution
 *
 * A post's output path comes either from an explicit `permalink` in its front
 * matter (used verbatim) or from a template selected by the site's permalink
 * style:
 *
 *   pretty  /:categories/:year/:month/:day/:title
 *   none    /:categories/:title.html
 *   date    /:categories/:year/:month/:day/:title.html
 *   other   the style string itself is the template
 */

import * as path from 'path';

export type NamedPermalinkStyle = 'pretty' | 'none' | 'date';

/** A named style or a custom template such as "/blog/:year/:title.html" */
export type PermalinkStyle = NamedPermalinkStyle | (string & {});

export const PERMALINK_TEMPLATES: Record<NamedPermalinkStyle, string> = {
  pretty: '/:categories/:year/:month/:day/:title',
  none: '/:categories/:title.html',
  date: '/:categories/:year/:month/:day/:title.html',
};

function isNamedStyle(style: string): style is NamedPermalinkStyle {
  return Object.prototype.hasOwnProperty.call(PERMALINK_TEMPLATES, style);
}

/**
 * What a permalink template is expanded from
 */
export interface PermalinkInput {
  date: Date;
  slug: string;
  categories: readonly string[];
}

export function permalinkTemplate(style: PermalinkStyle): string {
  return isNamedStyle(style) ? PERMALINK_TEMPLATES[style] : style;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Substitutes :year, :month, :day, :title and :categories in a template.
 *
 * Replacement is literal and runs in that order. A single pass then collapses
 * "//" into "/" (empty categories leave a leading "//").
 */
export function expandPermalink(template: string, input: PermalinkInput): string {
  const tokens: [string, string][] = [
    [':year', pad(input.date.getFullYear(), 4)],
    [':month', pad(input.date.getMonth() + 1, 2)],
    [':day', pad(input.date.getDate(), 2)],
    [':title', input.slug],
    [':categories', [...input.categories].sort().join('/')],
  ];

  const expanded = tokens.reduce(
    (result, [token, value]) => result.split(token).join(value),
    template
  );

  return expanded.split('//').join('/');
}

/**
 * The generated path of a post: the explicit permalink verbatim when set,
 * otherwise the expanded template of the style
 */
export function resolvePermalink(
  input: PermalinkInput,
  style: PermalinkStyle,
  explicitPermalink?: string
): string {
  if (explicitPermalink) {
    return explicitPermalink;
  }
  return expandPermalink(permalinkTemplate(style), input);
}

/**
 * The public URL of a generated path. With extensionless URLs (multiviews)
 * a trailing ".html" is dropped.
 */
export function permalinkUrl(generatedPath: string, multiviews: boolean): string {
  return multiviews ? generatedPath.replace(/\.html$/, '') : generatedPath;
}

/**
 * Whether output for this template is written as `<path>/index.html`
 */
export function writesIndexFile(template: string): boolean {
  return !/\.html$/.test(template);
}

/**
 * Absolute output file for a generated path under the destination root
 */
export function outputFilePath(destination: string, generatedPath: string, template: string): string {
  const target = path.join(destination, generatedPath);
  return writesIndexFile(template) ? path.join(target, 'index.html') : target;
}
