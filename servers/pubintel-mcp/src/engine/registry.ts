/**
 * Immutable lookups over the configured topics and publishers.
 */

import type { PublisherDefinition, TopicDefinition } from '@pubintel/core';

function freezeTopic(topic: TopicDefinition): Readonly<TopicDefinition> {
  return Object.freeze({
    ...topic,
    keywords: [...topic.keywords],
    synonyms: [...topic.synonyms],
    negativeKeywords: [...topic.negativeKeywords]
  });
}

export class TopicRegistry {
  private readonly _topics: ReadonlyArray<Readonly<TopicDefinition>>;
  private readonly _byKey: ReadonlyMap<string, Readonly<TopicDefinition>>;

  private constructor(topics: TopicDefinition[]) {
    const byKey = new Map<string, Readonly<TopicDefinition>>();
    const ordered: Readonly<TopicDefinition>[] = [];
    for (const topic of topics) {
      if (byKey.has(topic.key)) {
        throw new Error(`Duplicate topic key: ${topic.key}`);
      }
      const frozen = freezeTopic(topic);
      byKey.set(topic.key, frozen);
      ordered.push(frozen);
    }
    this._topics = Object.freeze(ordered);
    this._byKey = byKey;
  }

  static create(topics: TopicDefinition[]): TopicRegistry {
    return new TopicRegistry(topics);
  }

  /** Topics in configuration order. */
  get topics(): ReadonlyArray<Readonly<TopicDefinition>> {
    return this._topics;
  }

  getByKey(key: string): Readonly<TopicDefinition> | undefined {
    return this._byKey.get(key);
  }
}

export interface ResolvedPublishers {
  /** Canonical names for known publishers, verbatim input otherwise */
  names: string[];
  /** Every lower-cased name and alias a record's publisher may contain */
  matchTerms: string[];
  prefixes: string[];
}

export class PublisherRegistry {
  private readonly _publishers: ReadonlyArray<Readonly<PublisherDefinition>>;
  private readonly _byTerm: ReadonlyMap<string, Readonly<PublisherDefinition>>;

  private constructor(publishers: PublisherDefinition[]) {
    const byTerm = new Map<string, Readonly<PublisherDefinition>>();
    this._publishers = Object.freeze(publishers.map((p) => Object.freeze({ ...p })));
    for (const publisher of this._publishers) {
      for (const term of [publisher.name, ...publisher.aliases]) {
        const key = term.trim().toLowerCase();
        if (key && !byTerm.has(key)) {
          byTerm.set(key, publisher);
        }
      }
    }
    this._byTerm = byTerm;
  }

  static create(publishers: PublisherDefinition[]): PublisherRegistry {
    return new PublisherRegistry(publishers);
  }

  get publishers(): ReadonlyArray<Readonly<PublisherDefinition>> {
    return this._publishers;
  }

  /** Looks a publisher up by canonical name or alias, case-insensitively. */
  lookup(nameOrAlias: string): Readonly<PublisherDefinition> | undefined {
    return this._byTerm.get(nameOrAlias.trim().toLowerCase());
  }

  resolve(selected: string[]): ResolvedPublishers {
    const names: string[] = [];
    const matchTerms = new Set<string>();
    const prefixes = new Set<string>();

    for (const raw of selected) {
      const value = raw.trim();
      if (!value) continue;
      const publisher = this.lookup(value);
      if (publisher) {
        if (!names.includes(publisher.name)) names.push(publisher.name);
        for (const term of [publisher.name, ...publisher.aliases]) {
          matchTerms.add(term.trim().toLowerCase());
        }
        for (const prefix of publisher.prefixes) prefixes.add(prefix.trim().toLowerCase());
      } else {
        if (!names.includes(value)) names.push(value);
        matchTerms.add(value.toLowerCase());
      }
    }

    return {
      names,
      matchTerms: [...matchTerms].filter(Boolean),
      prefixes: [...prefixes].sort()
    };
  }

  /** Lower-cased terms identifying one publisher in record metadata. */
  termsFor(name: string): string[] {
    return this.resolve([name]).matchTerms;
  }
}

/** A record publisher matches when it contains any of the terms. */
export function publisherMatches(recordPublisher: string | undefined, terms: string[]): boolean {
  if (terms.length === 0) return true;
  const value = (recordPublisher ?? '').toLowerCase();
  if (!value) return false;
  return terms.some((term) => value.includes(term));
}
