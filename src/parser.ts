/**
 * Condition Parser
 *
 * Turns human-readable condition expressions into Condition values through an
 * ordered registry of (pattern, builder) rules. Items may be combined with
 * `&`, `|`, `~` and parentheses; `~` binds tightest, then `&`, then `|`.
 */

import { indexToWeekday, parseWeekday, weekdayToIndex, type Weekday } from './time-date'
import {
  type Condition,
  alwaysFalse,
  alwaysTrue,
  and,
  not,
  or,
  timeCondition,
} from './condition-evaluation'

// ============================================================================
// Types
// ============================================================================

/** Receives the capture groups of a RegExp rule, nothing for a string rule. */
export type ConditionBuilder = (...groups: string[]) => Condition

export type ParseRule = {
  pattern: string | RegExp
  build: ConditionBuilder
}

export type ConditionParser = {
  /**
   * Registers a rule after the existing ones. Items reach the rules after the
   * expression is split on `& | ~ ( )`, so a pattern that needs one of those
   * characters in the item text never matches.
   */
  addRule: (pattern: string | RegExp, build: ConditionBuilder) => void
  parseItem: (text: string) => Condition
  parse: (expression: string) => Condition
}

export type ConditionParserOptions = {
  /** Extra rules, tried after the defaults */
  rules?: ParseRule[]
  /** Register the built-in schedule phrases (default true) */
  defaults?: boolean
}

// ============================================================================
// Errors
// ============================================================================

export { ConditionParseError } from './errors'
import { ConditionParseError } from './errors'

// ============================================================================
// Default Rules
// ============================================================================

const TIME = '(\\d{2}:\\d{2}(?::\\d{2})?)'
const DAY = '([a-z]+)'
const ORDINAL = '(?:the )?(\\d{1,2})(?:st|nd|rd|th)?'
const DATETIME = '(\\d{4}-\\d{2}-\\d{2}[t ]\\d{2}:\\d{2}(?::\\d{2})?)'

function requireWeekday(name: string): Weekday {
  const result = parseWeekday(name)
  if (!result.ok) throw new ConditionParseError(result.error.message, name)
  return result.value
}

function dayAfter(weekday: Weekday): Weekday {
  return indexToWeekday(weekdayToIndex(weekday) + 1)
}

export function defaultRules(): ParseRule[] {
  return [
    { pattern: 'true', build: alwaysTrue },
    { pattern: 'always true', build: alwaysTrue },
    { pattern: 'false', build: alwaysFalse },
    { pattern: 'always false', build: alwaysFalse },
    {
      pattern: new RegExp(`(?:daily|time of day) between ${TIME} and ${TIME}`),
      build: (start, end) => timeCondition({ type: 'timeOfDay', start, end }),
    },
    {
      pattern: new RegExp(`daily after ${TIME}`),
      build: (start) => timeCondition({ type: 'timeOfDay', start, end: '00:00' }),
    },
    {
      pattern: new RegExp(`daily before ${TIME}`),
      build: (end) => timeCondition({ type: 'timeOfDay', start: '00:00', end }),
    },
    {
      pattern: new RegExp(`weekly between ${DAY} ${TIME} and ${DAY} ${TIME}`),
      build: (startDay, startTime, endDay, endTime) =>
        timeCondition({
          type: 'timeOfWeek',
          startDay: requireWeekday(startDay),
          startTime,
          endDay: requireWeekday(endDay),
          endTime,
        }),
    },
    {
      pattern: new RegExp(`(?:weekly )?on ${DAY}`),
      build: (day) => {
        const weekday = requireWeekday(day)
        return timeCondition({ type: 'timeOfWeek', startDay: weekday, startTime: '00:00', endDay: dayAfter(weekday), endTime: '00:00' })
      },
    },
    {
      pattern: new RegExp(`monthly between ${ORDINAL} and ${ORDINAL}`),
      build: (startDay, endDay) =>
        timeCondition({ type: 'timeOfMonth', startDay: parseInt(startDay, 10), endDay: parseInt(endDay, 10) }),
    },
    {
      pattern: new RegExp(`between ${DATETIME} and ${DATETIME}`),
      build: (start, end) => timeCondition({ type: 'between', start: start.toUpperCase(), end: end.toUpperCase() }),
    },
    {
      pattern: new RegExp(`(?:after|from) ${DATETIME}`),
      build: (start) => timeCondition({ type: 'between', start: start.toUpperCase(), end: null }),
    },
    {
      pattern: new RegExp(`(?:before|until) ${DATETIME}`),
      build: (end) => timeCondition({ type: 'between', start: null, end: end.toUpperCase() }),
    },
  ]
}

// ============================================================================
// Rule Matching
// ============================================================================

type CompiledRule =
  | { kind: 'exact'; text: string; build: ConditionBuilder }
  | { kind: 'regex'; regex: RegExp; build: ConditionBuilder }

function normalize(text: string): string {
  return text.trim().replace(/\s+/g, ' ')
}

function compileRule(pattern: string | RegExp, build: ConditionBuilder): CompiledRule {
  if (typeof pattern === 'string') {
    return { kind: 'exact', text: normalize(pattern).toLowerCase(), build }
  }
  const flags = pattern.flags.replace(/[gy]/g, '')
  // Rules match the whole item, never a substring of it
  const regex = new RegExp(`^(?:${pattern.source})$`, flags.includes('i') ? flags : flags + 'i')
  return { kind: 'regex', regex, build }
}

function tryRule(rule: CompiledRule, item: string): Condition | null {
  if (rule.kind === 'exact') {
    return item.toLowerCase() === rule.text ? rule.build() : null
  }
  const match = rule.regex.exec(item)
  if (!match) return null
  return rule.build(...match.slice(1).map((group) => group ?? ''))
}

// ============================================================================
// Expression Grammar
// ============================================================================

type Token =
  | { kind: 'and' | 'or' | 'not' | 'open' | 'close' }
  | { kind: 'item'; text: string }

const OPERATORS: Record<string, 'and' | 'or' | 'not' | 'open' | 'close'> = {
  '&': 'and',
  '|': 'or',
  '~': 'not',
  '(': 'open',
  ')': 'close',
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = []
  let buffer = ''
  const flush = () => {
    const text = normalize(buffer)
    if (text) tokens.push({ kind: 'item', text })
    buffer = ''
  }
  for (const ch of expression) {
    const op = OPERATORS[ch]
    if (op) {
      flush()
      tokens.push({ kind: op })
    } else {
      buffer += ch
    }
  }
  flush()
  return tokens
}

function parseTokens(tokens: Token[], parseItem: (text: string) => Condition, input: string): Condition {
  let pos = 0
  const fail = (reason: string) => new ConditionParseError(`${reason} in condition: '${input}'`, input)

  function parseOr(): Condition {
    let result = parseAnd()
    while (tokens[pos]?.kind === 'or') {
      pos++
      result = or(result, parseAnd())
    }
    return result
  }

  function parseAnd(): Condition {
    let result = parseUnary()
    while (tokens[pos]?.kind === 'and') {
      pos++
      result = and(result, parseUnary())
    }
    return result
  }

  function parseUnary(): Condition {
    const token = tokens[pos++]
    if (!token) throw fail('Unexpected end of input')
    switch (token.kind) {
      case 'not':
        return not(parseUnary())
      case 'open': {
        const inner = parseOr()
        if (tokens[pos]?.kind !== 'close') throw fail('Missing closing parenthesis')
        pos++
        return inner
      }
      case 'item':
        return parseItem(token.text)
      default:
        throw fail(`Unexpected '${token.kind}'`)
    }
  }

  const result = parseOr()
  if (pos < tokens.length) throw fail('Unexpected trailing input')
  return result
}

// ============================================================================
// Factory
// ============================================================================

export function createConditionParser(options?: ConditionParserOptions): ConditionParser {
  const rules: CompiledRule[] = []

  function addRule(pattern: string | RegExp, build: ConditionBuilder): void {
    rules.push(compileRule(pattern, build))
  }

  if (options?.defaults ?? true) {
    for (const rule of defaultRules()) addRule(rule.pattern, rule.build)
  }
  for (const rule of options?.rules ?? []) addRule(rule.pattern, rule.build)

  function parseItem(text: string): Condition {
    const item = normalize(text)
    for (const rule of rules) {
      const condition = tryRule(rule, item)
      if (condition !== null) return condition
    }
    throw new ConditionParseError(`Cannot parse the condition: '${text}'`, text)
  }

  function parse(expression: string): Condition {
    return parseTokens(tokenize(expression), parseItem, expression)
  }

  return { addRule, parseItem, parse }
}
