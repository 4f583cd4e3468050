import type { Topic } from '../types/index.js';

export const DEFAULT_TOPIC_NAMESPACE = 'twitter';

/**
 * Turns user-entered hashtag text into a broker topic.
 *
 * Surrounding whitespace and a single leading `#` are stripped, then the tag
 * is prefixed with `namespace/`. Returns `""` when nothing is left; callers
 * must treat that as invalid input.
 *
 * @example
 * normalizeTopic('  #Test  ') // 'twitter/Test'
 * normalizeTopic('#')         // ''
 */
export function normalizeTopic(raw: string, namespace: string = DEFAULT_TOPIC_NAMESPACE): Topic {
  let tag = raw.trim();
  if (tag.startsWith('#')) tag = tag.slice(1).trim();
  if (!tag) return '';
  return `${namespace}/${tag}`;
}
