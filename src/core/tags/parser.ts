/**
 * Field tag parser.
 *
 * A tag is a comma-separated list. The first token is the name slot
 * (empty for the default name, `-` to ignore the field); the rest are
 * omission directives, `transform=<name>`, `<rule>=<param>` or bare rule names.
 */
import { ModelError, ErrorCodes } from '../../utils/errors.js';
import type { OmitScope, ParsedTag, RuleDirective, TagDirective } from './types.js';

const IGNORE_TOKEN = '-';
const TRANSFORM_PREFIX = 'transform=';

const OMIT_TOKENS: Record<string, OmitScope> = {
  omitempty: 'always',
  omitempty_create: 'create',
  omitempty_update: 'update',
  omitempty_validate: 'validate',
};

// Store names become document keys: no path separators, no operators,
// no prototype key. A "=" here means the tag is missing its name slot.
const INVALID_NAME_PATTERN = /^\$|[.=]|^__proto__$/;

const cache = new Map<string, ParsedTag>();

/**
 * Parse a tag string. Results are cached by tag text and frozen.
 * Rule names are not resolved here; the engine resolves them when they run.
 */
export function parseTag(tag: string): ParsedTag {
  const cached = cache.get(tag);
  if (cached) {
    return cached;
  }
  const parsed = freeze(parseTokens(tag));
  cache.set(tag, parsed);
  return parsed;
}

function parseTokens(tag: string): ParsedTag {
  const [first = '', ...rest] = tag.split(',').map((token) => token.trim());
  const directives: TagDirective[] = [];

  if (first === IGNORE_TOKEN) {
    directives.push({ kind: 'ignore' });
    return { directives, ignore: true, omitEmpty: [], rules: [] };
  }

  let name: string | undefined;
  if (first !== '') {
    if (INVALID_NAME_PATTERN.test(first)) {
      throw tagError(tag, `invalid store name "${first}"`);
    }
    name = first;
    directives.push({ kind: 'name', name });
  }

  const omitEmpty: OmitScope[] = [];
  const rules: RuleDirective[] = [];

  for (const token of rest) {
    if (token === '') continue;

    if (token === IGNORE_TOKEN) {
      throw tagError(tag, '"-" is only allowed as the first token');
    }

    if (token.startsWith('omitempty')) {
      const scope = OMIT_TOKENS[token];
      if (!scope) {
        throw tagError(tag, `unknown omission directive "${token}"`);
      }
      if (!omitEmpty.includes(scope)) {
        omitEmpty.push(scope);
      }
      directives.push({ kind: 'omitempty', scope });
      continue;
    }

    const rule = parseRule(tag, token);
    rules.push(rule);
    directives.push(rule);
  }

  return { directives, name, ignore: false, omitEmpty, rules };
}

function parseRule(tag: string, token: string): RuleDirective {
  if (token.startsWith(TRANSFORM_PREFIX)) {
    const name = token.slice(TRANSFORM_PREFIX.length).trim();
    if (!name) {
      throw tagError(tag, `missing transformation name in "${token}"`);
    }
    return { kind: 'transformation', name, token };
  }

  const eq = token.indexOf('=');
  if (eq === -1) {
    return { kind: 'validation', name: token, token };
  }

  const name = token.slice(0, eq).trim();
  if (!name) {
    throw tagError(tag, `missing rule name in "${token}"`);
  }
  return { kind: 'validation', name, param: token.slice(eq + 1).trim(), token };
}

function tagError(tag: string, reason: string): ModelError {
  return new ModelError(ErrorCodes.INVALID_TAG, `Invalid tag "${tag}": ${reason}`, { tag });
}

function freeze(parsed: ParsedTag): ParsedTag {
  for (const directive of parsed.directives) {
    Object.freeze(directive);
  }
  Object.freeze(parsed.directives);
  Object.freeze(parsed.omitEmpty);
  Object.freeze(parsed.rules);
  return Object.freeze(parsed);
}
