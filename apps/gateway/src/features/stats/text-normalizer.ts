import he from 'he';

const SCRIPT_ELEMENT = /<script\b[^>]*>[\s\S]*?<\/script\s*>/gi;
const STYLE_ELEMENT = /<style\b[^>]*>[\s\S]*?<\/style\s*>/gi;
const HTML_COMMENT = /<!--[\s\S]*?-->/g;
const TAG = /<[^>]*>/g;

/**
 * Reduces a rendered fragment to its visible text: script and style elements
 * are dropped with their content, remaining tags are removed without adding
 * spaces, entities are decoded and whitespace runs collapse to one space.
 */
export const normalize = (html: string): string => {
  if (!html) {
    return '';
  }

  const withoutMarkup = html
    .replace(SCRIPT_ELEMENT, '')
    .replace(STYLE_ELEMENT, '')
    .replace(HTML_COMMENT, '')
    .replace(TAG, '');

  return he.decode(withoutMarkup).replace(/\s+/g, ' ').trim();
};
