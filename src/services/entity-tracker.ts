/**
 * Entity State Tracker
 * Folds facts matched by lightweight rules into per-entity attribute bags
 * and renders them as a context block for the next prompt.
 */

import type { EntityObservation, EntityRecord, EntityRule, EntityValue } from '../types/index.js';
import { logger } from '../logger.js';
import { TextProcessor } from '../utils/text-processing.js';

const log = logger.child({ component: 'entity-tracker' });

export const NO_CONTEXT = 'No prior context available.';

// Capitalised words that open a sentence without naming anything
const LEADING_WORDS = [
  'What', 'Who', 'Which', 'Where', 'When', 'Why', 'How', 'Is', 'Was', 'Does', 'Did', 'It', 'This', 'That',
  'Yes', 'No', 'Currently', 'Today', 'Now', 'Actually', 'Indeed', 'Well', 'Also', 'However', 'Yesterday',
  'Sure', 'Certainly', 'Still', 'So', 'Then', 'As'
];

// Capitalised word runs on one line ("Paris", "United States"), not starting with a leading word
const PROPER_NAME = `(?!(?:${LEADING_WORDS.join('|')})\\b)[A-Z][\\w'-]*(?: +[A-Z][\\w'-]*)*`;

// Role words match with or without a capital first letter ("president", "President")
const ROLES = ['president', 'vice president', 'prime minister', 'capital', 'ceo', 'founder', 'mayor', 'governor',
  'author', 'king', 'queen', 'currency']
  .map(role => role.replace(/\b([a-z])/g, (letter: string) => `[${letter.toUpperCase()}${letter}]`))
  .concat('CEO')
  .join('|');

function withGlobalFlag(pattern: RegExp): RegExp {
  return pattern.flags.includes('g') ? pattern : new RegExp(pattern.source, pattern.flags + 'g');
}

function readGroup(match: RegExpMatchArray, name: string): string | undefined {
  const value = match.groups?.[name];
  return value === undefined ? undefined : TextProcessor.normalizeWhitespace(value);
}

export interface PatternRuleOptions {
  name: string;
  /** Named groups: `entity` and `value`, plus `attribute` unless one is fixed */
  pattern: RegExp;
  attribute?: string;
}

/**
 * Rule driven by one regular expression with named groups
 */
export function patternRule(options: PatternRuleOptions): EntityRule {
  const pattern = withGlobalFlag(options.pattern);

  return {
    name: options.name,
    extract(text: string): EntityObservation[] {
      const observations: EntityObservation[] = [];
      for (const match of text.matchAll(pattern)) {
        const entity = readGroup(match, 'entity');
        const value = readGroup(match, 'value');
        const attribute = options.attribute ?? readGroup(match, 'attribute');
        if (entity && value && attribute) {
          observations.push({ entity, attribute: TextProcessor.toAttributeKey(attribute), value });
        }
      }
      return observations;
    }
  };
}

export interface KeywordRuleOptions {
  name: string;
  /** Rule fires only when one of these words appears */
  keywords: string[];
  entity: string;
  attribute: string;
  /** First capture group is the value */
  pattern: RegExp;
}

/**
 * Rule gated on trigger words, for facts about a known entity
 * ("age" in the question, "78" in the answer).
 */
export function keywordRule(options: KeywordRuleOptions): EntityRule {
  const pattern = new RegExp(options.pattern.source, options.pattern.flags.replace('g', ''));

  return {
    name: options.name,
    extract(text: string): EntityObservation[] {
      if (!options.keywords.some(keyword => TextProcessor.containsWord(text, keyword))) {
        return [];
      }
      const match = text.match(pattern);
      const value = match?.[1] === undefined ? undefined : TextProcessor.normalizeWhitespace(match[1]);
      return value
        ? [{ entity: options.entity, attribute: TextProcessor.toAttributeKey(options.attribute), value }]
        : [];
    }
  };
}

export const DEFAULT_ENTITY_RULES: readonly EntityRule[] = [
  // "Paris is the capital of France"
  patternRule({
    name: 'role-of',
    pattern: new RegExp(`\\b(?<value>${PROPER_NAME}) is the (?<attribute>${ROLES}) of (?:the )?(?<entity>${PROPER_NAME})`, 'g')
  }),
  // "The capital of France is Paris"
  patternRule({
    name: 'the-role-of',
    pattern: new RegExp(`\\b[Tt]he (?<attribute>${ROLES}) of (?:the )?(?<entity>${PROPER_NAME}) is (?<value>${PROPER_NAME})`, 'g')
  }),
  // "Donald Trump is 78 years old"
  patternRule({
    name: 'age',
    attribute: 'age',
    pattern: new RegExp(`\\b(?<entity>${PROPER_NAME}) is (?<value>\\d{1,3}) years old`, 'g')
  })
];

export class EntityStateTracker {
  private readonly entities = new Map<string, Map<string, EntityValue>>();

  constructor(
    private readonly rules: readonly EntityRule[] = DEFAULT_ENTITY_RULES,
    initial: readonly EntityRecord[] = []
  ) {
    for (const record of initial) {
      for (const [attribute, value] of Object.entries(record.attributes)) {
        this.set(record.name, attribute, value);
      }
    }
  }

  /**
   * Apply every rule to the text and merge matches, last write wins per attribute
   */
  update(observedText: string): EntityObservation[] {
    const observations = this.rules.flatMap(rule => rule.extract(observedText));
    for (const { entity, attribute, value } of observations) {
      this.set(entity, attribute, value);
    }

    if (observations.length > 0) {
      log.debug({ observations: observations.length }, 'Entity state updated');
    }
    return observations;
  }

  get(name: string): EntityRecord | undefined {
    const attributes = this.entities.get(name);
    return attributes ? { name, attributes: Object.fromEntries(attributes) } : undefined;
  }

  get size(): number {
    return this.entities.size;
  }

  /**
   * Entity records in first-seen order, for priming a later session
   */
  snapshot(): EntityRecord[] {
    return Array.from(this.entities, ([name, attributes]) => ({
      name,
      attributes: Object.fromEntries(attributes)
    }));
  }

  /**
   * One line per entity: "France: capital: Paris, population: 68 million"
   */
  render(): string {
    if (this.entities.size === 0) {
      return NO_CONTEXT;
    }

    return Array.from(this.entities, ([name, attributes]) => {
      const attrs = Array.from(attributes, ([key, value]) => `${key}: ${value}`).join(', ');
      return `${name}: ${attrs}`;
    }).join('\n');
  }

  private set(entity: string, attribute: string, value: EntityValue): void {
    let attributes = this.entities.get(entity);
    if (!attributes) {
      attributes = new Map();
      this.entities.set(entity, attributes);
    }
    attributes.set(attribute, value);
  }
}
