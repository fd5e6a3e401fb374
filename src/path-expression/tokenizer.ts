import { PathToken } from './types';

const INDEX_PATTERN = /^[0-9]+$/;

/**
 * Split a path expression into tokens.
 * Examples:
 * "Title" -> [{name: 'Title'}]
 * "OriginalSource.Items[0].Title" -> [{name: 'OriginalSource'}, {name: 'Items', index: 0}, {name: 'Title'}]
 * " Child .. Name " -> [{name: 'Child'}, {name: 'Name'}]
 *
 * Never throws: a segment whose indexer is not a non-negative integer
 * (`Tags[`, `Tags[abc]`, `Tags[-1]`, `Tags[1.5]`) is kept whole as the name.
 */
export function tokenizePath(path: string): readonly PathToken[] {
  const tokens: PathToken[] = [];

  for (const part of path.split('.')) {
    const segment = part.trim();
    if (!segment) {
      continue;
    }
    tokens.push(Object.freeze(parseSegment(segment)));
  }

  return Object.freeze(tokens);
}

function parseSegment(segment: string): PathToken {
  const open = segment.indexOf('[');
  if (open < 0 || !segment.endsWith(']')) {
    return { name: segment };
  }

  const content = segment.slice(open + 1, segment.length - 1).trim();
  if (!INDEX_PATTERN.test(content)) {
    return { name: segment };
  }

  const index = Number.parseInt(content, 10);
  if (!Number.isSafeInteger(index)) {
    return { name: segment };
  }

  return { name: segment.slice(0, open), index };
}
