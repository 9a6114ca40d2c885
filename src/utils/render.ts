import nunjucks from 'nunjucks';
import type { Tool } from '../types.js';
import { SkillsError, errorMessage } from './errors.js';

/**
 * Template rendering for skill files.
 *
 * A source SKILL.md is a nunjucks template with exactly one binding, `tool`,
 * holding the target tool's id:
 *
 *   {% if tool == "codex" %}Run `codex exec` instead.{% endif %}
 *
 * Any other free variable is an error, including ones only used in a
 * condition, so a mistyped name never renders as an empty section.
 */

export type RenderResult = { ok: true; output: string } | { ok: false; error: string };

const KEYWORDS = new Set([
  'and',
  'or',
  'not',
  'in',
  'is',
  'if',
  'else',
  'true',
  'false',
  'none',
  'True',
  'False',
  'None',
  'super',
]);

const BUILTIN_GLOBALS = new Set(['range', 'cycler', 'joiner']);

const RAW_BLOCK = /\{%-?\s*(raw|verbatim)\s*-?%\}[\s\S]*?\{%-?\s*end\1\s*-?%\}/g;
const COMMENT = /\{#[\s\S]*?#\}/g;
const TAG = /\{\{-?([\s\S]*?)-?\}\}|\{%-?([\s\S]*?)-?%\}/g;
const STRING_LITERAL = /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g;
const TOKEN = /[A-Za-z_][A-Za-z0-9_]*|\d[\d.]*(?:[eE][+-]?\d+)?|==|!=|<=|>=|\*\*|\/\/|\S/g;
const NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

let cachedEnv: nunjucks.Environment | null = null;

function getEnvironment(): nunjucks.Environment {
  if (cachedEnv) return cachedEnv;
  cachedEnv = new nunjucks.Environment(null, {
    autoescape: false,
    throwOnUndefined: true,
  });
  return cachedEnv;
}

function splitNames(list: string): string[] {
  return list
    .split(',')
    .map((part) => part.trim())
    .filter((part) => NAME.test(part));
}

interface Scope {
  names: Set<string>;
  /** Tag that closes this scope */
  end?: string;
  /** Bound in the enclosing scope once this one closes */
  bindsOnClose?: string[];
}

/**
 * Walks template tags in order, keeping the names visible at each point
 */
class BindingTracker {
  readonly missing = new Set<string>();
  private readonly scopes: Scope[];
  /** Root names still holding the tool id string */
  private readonly stringNames: Set<string>;

  constructor(defined: readonly string[]) {
    this.scopes = [{ names: new Set(defined) }];
    this.stringNames = new Set(defined);
  }

  private owner(name: string): Scope | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (this.scopes[i].names.has(name)) return this.scopes[i];
    }
    return undefined;
  }

  bind(names: string[]): void {
    for (const name of names) {
      // assignment updates an outer binding of the same name
      const scope = this.owner(name) ?? this.scopes[this.scopes.length - 1];
      scope.names.add(name);
      if (scope === this.scopes[0]) this.stringNames.delete(name);
    }
  }

  open(end: string, names: string[], bindsOnClose?: string[]): void {
    this.scopes.push({ names: new Set(names), end, bindsOnClose });
  }

  close(end: string): void {
    const top = this.scopes[this.scopes.length - 1];
    if (this.scopes.length === 1 || top.end !== end) return;
    this.scopes.pop();
    if (top.bindsOnClose) this.bind(top.bindsOnClose);
  }

  /**
   * Record every free name in an expression that is not bound yet
   */
  check(expression: string): void {
    const tokens = expression.match(TOKEN) ?? [];
    const brackets: string[] = [];

    tokens.forEach((token, i) => {
      if ('([{'.includes(token)) brackets.push(token);
      if (')]}'.includes(token)) brackets.pop();
      if (!NAME.test(token)) return;

      const prev = tokens[i - 1];
      const next = tokens[i + 1];
      if (prev === '.' || prev === '|') return; // attribute or filter
      if (prev === 'is' || (prev === 'not' && tokens[i - 2] === 'is')) return; // test name
      if (next === '=') return; // keyword argument
      if (next === ':' && brackets[brackets.length - 1] === '{') return; // dict key
      if (KEYWORDS.has(token) || BUILTIN_GLOBALS.has(token)) return;

      const scope = this.owner(token);
      if (!scope) {
        this.missing.add(token);
        return;
      }
      const attribute = tokens[i + 2];
      if (
        scope === this.scopes[0] &&
        this.stringNames.has(token) &&
        next === '.' &&
        attribute !== undefined &&
        NAME.test(attribute) &&
        !(attribute in String.prototype)
      ) {
        this.missing.add(`${token}.${attribute}`);
      }
    });
  }
}

function visitStatement(body: string, tracker: BindingTracker): void {
  const match = /^([A-Za-z_]+)\s*([\s\S]*)$/.exec(body.trim());
  if (!match) {
    tracker.check(body);
    return;
  }
  const [, keyword, rest] = match;

  switch (keyword) {
    case 'for': {
      const forMatch = /^([\s\S]*?)\s+in\s+([\s\S]*)$/.exec(rest);
      if (!forMatch) {
        tracker.check(rest);
        return;
      }
      tracker.check(forMatch[2]);
      tracker.open('endfor', [...splitNames(forMatch[1]), 'loop']);
      return;
    }
    case 'set': {
      const eq = rest.indexOf('=');
      if (eq < 0) {
        tracker.open('endset', [], splitNames(rest));
        return;
      }
      tracker.check(rest.slice(eq + 1));
      tracker.bind(splitNames(rest.slice(0, eq)));
      return;
    }
    case 'macro': {
      const macroMatch = /^([A-Za-z_][A-Za-z0-9_]*)\s*\(([\s\S]*)\)\s*$/.exec(rest);
      if (!macroMatch) return;
      const params: string[] = [];
      for (const param of macroMatch[2].split(',')) {
        const [name, ...defaultValue] = param.split('=');
        params.push(name);
        if (defaultValue.length > 0) tracker.check(defaultValue.join('='));
      }
      tracker.bind([macroMatch[1]]);
      tracker.open('endmacro', [...splitNames(params.join(',')), 'caller', 'varargs', 'kwargs']);
      return;
    }
    case 'call': {
      const callMatch = /^(?:\(([^)]*)\))?\s*([\s\S]*)$/.exec(rest);
      if (!callMatch) return;
      tracker.check(callMatch[2]);
      tracker.open('endcall', splitNames(callMatch[1] ?? ''));
      return;
    }
    case 'filter':
      tracker.check(rest.replace(/^[A-Za-z_][A-Za-z0-9_]*/, ''));
      return;
    case 'import': {
      const alias = /\bas\s+([A-Za-z_][A-Za-z0-9_]*)\s*$/.exec(rest);
      if (alias) tracker.bind([alias[1]]);
      return;
    }
    case 'from': {
      const imported = /\bimport\s+([\s\S]*)$/.exec(rest);
      if (!imported) return;
      for (const part of imported[1].split(',')) {
        const name = /([A-Za-z_][A-Za-z0-9_]*)\s*$/.exec(part);
        if (name) tracker.bind([name[1]]);
      }
      return;
    }
    case 'block':
    case 'else':
      return;
    default:
      if (keyword.startsWith('end')) {
        tracker.close(keyword);
        return;
      }
      // if, elif, switch, case, include, extends
      tracker.check(rest);
  }
}

/**
 * Names a template references that will not be defined at that point when rendering.
 *
 * Bindings follow template order and scope: a `for` target is gone after
 * `endfor`, and a `set` only covers what comes after it. Attributes of a
 * string variable must exist on strings, so `tool.nme` is reported.
 */
export function findUndefinedVariables(template: string, defined: readonly string[] = ['tool']): string[] {
  const tracker = new BindingTracker(defined);
  const stripped = template.replace(RAW_BLOCK, '').replace(COMMENT, '');

  for (const match of stripped.matchAll(TAG)) {
    if (match[1] !== undefined) {
      tracker.check(match[1].replace(STRING_LITERAL, '""'));
    } else if (match[2] !== undefined) {
      visitStatement(match[2].replace(STRING_LITERAL, '""'), tracker);
    }
  }
  return [...tracker.missing].sort();
}

/**
 * Render a skill template for one tool
 */
export function renderSkill(contents: string, tool: Tool): RenderResult {
  const missing = findUndefinedVariables(contents);
  if (missing.length > 0) {
    const quoted = missing.map((name) => `'${name}'`).join(', ');
    return {
      ok: false,
      error: `undefined variable${missing.length > 1 ? 's' : ''} ${quoted}`,
    };
  }

  try {
    return { ok: true, output: getEnvironment().renderString(contents, { tool }) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

export function renderSkillOrThrow(contents: string, tool: Tool, path?: string): string {
  const result = renderSkill(contents, tool);
  if (!result.ok) {
    throw new SkillsError('render', `Failed to render template${path ? ` ${path}` : ''}: ${result.error}`, {
      path,
    });
  }
  return result.output;
}
