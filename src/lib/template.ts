import { TemplateParams, TemplateValue } from '../interfaces';
import { TemplateError } from './errors';

export type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'field'; path: string[]; line: number };

const OPEN_DELIM = '{{';
const CLOSE_DELIM = '}}';

// one or more ".Name" segments, e.g. .Image or .Target.Host
const FIELD_PATTERN = /^(\.[A-Za-z_][A-Za-z0-9_]*)+$/;

// {{/* ... */}}, optionally with trim markers: {{- /* ... */ -}}
const COMMENT_PATTERN = /\{\{(-[ \t\r\n])?\/\*[\s\S]*?\*\/([ \t\r\n]-)?\}\}/y;
const COMMENT_START = /\{\{(-[ \t\r\n])?\/\*/y;

const TRIM_LEFT = /^-[ \t\r\n]/;
const TRIM_RIGHT = /[ \t\r\n]-$/;

function lineAt(template: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (template[i] === '\n') line++;
  }
  return line;
}

function isRecord(value: TemplateValue): value is TemplateParams {
  return typeof value === 'object' && value !== null;
}

function matchesAt(pattern: RegExp, template: string, offset: number) {
  pattern.lastIndex = offset;
  return pattern.exec(template);
}

// "{{- " drops the whitespace before the action
function trimPrecedingText(nodes: TemplateNode[]): void {
  const last = nodes[nodes.length - 1];
  if (!last || last.type !== 'text') return;

  const value = last.value.replace(/[ \t\r\n]+$/, '');
  if (value) {
    nodes[nodes.length - 1] = { type: 'text', value };
  } else {
    nodes.pop();
  }
}

// " -}}" drops the whitespace after the action
function skipWhitespace(template: string, offset: number): number {
  let next = offset;
  while (next < template.length && /[ \t\r\n]/.test(template[next])) {
    next++;
  }
  return next;
}

/**
 * @description Splits a template into literal text and field references.
 * Comments and the `{{-`/`-}}` trim markers are resolved here, so rendering
 * only sees text and fields. Fails on an unclosed or non-field action before
 * anything is substituted.
 */
export function parseTemplate(template: string): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf(OPEN_DELIM, cursor);
    if (open === -1) {
      nodes.push({ type: 'text', value: template.slice(cursor) });
      break;
    }
    if (open > cursor) {
      nodes.push({ type: 'text', value: template.slice(cursor, open) });
    }

    const line = lineAt(template, open);

    const comment = matchesAt(COMMENT_PATTERN, template, open);
    if (comment) {
      if (comment[1]) trimPrecedingText(nodes);
      cursor = open + comment[0].length;
      if (comment[2]) cursor = skipWhitespace(template, cursor);
      continue;
    }
    if (matchesAt(COMMENT_START, template, open)) {
      throw new TemplateError('unclosed comment', line);
    }

    const close = template.indexOf(CLOSE_DELIM, open + OPEN_DELIM.length);
    if (close === -1) {
      throw new TemplateError('unclosed action', line);
    }

    const raw = template.slice(open + OPEN_DELIM.length, close);
    const trimLeft = TRIM_LEFT.test(raw);
    const trimRight = TRIM_RIGHT.test(raw);
    const action = raw
      .slice(trimLeft ? 2 : 0, trimRight ? Math.max(raw.length - 2, 0) : raw.length)
      .trim();

    if (action.length === 0) {
      throw new TemplateError('missing value for action', line);
    }
    if (!FIELD_PATTERN.test(action)) {
      throw new TemplateError(
        `unsupported action "${action}", expected a field reference such as {{.Image}}`,
        line
      );
    }

    if (trimLeft) trimPrecedingText(nodes);
    nodes.push({ type: 'field', path: action.slice(1).split('.'), line });
    cursor = close + CLOSE_DELIM.length;
    if (trimRight) cursor = skipWhitespace(template, cursor);
  }

  return nodes;
}

function resolveField(
  params: TemplateParams,
  path: string[],
  line: number
): string {
  let current: TemplateValue = params;

  for (let i = 0; i < path.length; i++) {
    const name = path[i];
    if (!isRecord(current)) {
      throw new TemplateError(
        `can't evaluate field ${name} in non-record value .${path.slice(0, i).join('.')}`,
        line
      );
    }
    if (!Object.prototype.hasOwnProperty.call(current, name)) {
      throw new TemplateError(
        `can't evaluate field ${name}: no such field in parameters`,
        line
      );
    }
    current = current[name];
  }

  if (current === undefined || current === null) {
    throw new TemplateError(`field .${path.join('.')} has no value`, line);
  }
  if (isRecord(current)) {
    throw new TemplateError(
      `field .${path.join('.')} is a record, not a printable value`,
      line
    );
  }

  return String(current);
}

/**
 * @description Renders a template such as `echo {{.Image}}` against the given parameters.
 * Pure: touches neither the filesystem nor the network.
 */
export function renderTemplate(
  template: string,
  params: TemplateParams
): string {
  const nodes = parseTemplate(template);

  return nodes
    .map((node) =>
      node.type === 'text'
        ? node.value
        : resolveField(params, node.path, node.line)
    )
    .join('');
}
