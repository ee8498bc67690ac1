import { EGO_TAG, sinnerTag, statusTag, tagRules, type KeywordTable, type TagRules } from './tagRules';
import { escapeRegExp } from './textUtils';
import { emptyEntities, type ChunkDraft, type ChunkEntities, type TaggedChunk } from './types';

interface CompiledCategory {
  label: string;
  pattern: RegExp;
}

export interface TagResult {
  tags: string[];
  entities: ChunkEntities;
}

const EGO_MENTION_REGEX = /ego|E\.G\.O/i;
const EGO_NAME_REGEX = /[Ee][Gg][Oo][：:]\s*([^\s,，。]+)/g;
const IDENTITY_NAME_REGEX = /人格[：:]\s*([^\s,，。]+)/g;

function compileAlternation(keywords: readonly string[], flags: string): RegExp {
  return new RegExp(keywords.map(escapeRegExp).join('|'), flags);
}

function compileTable(table: KeywordTable): CompiledCategory[] {
  return Object.entries(table).map(([label, keywords]) => ({
    label,
    pattern: compileAlternation(keywords, 'i'),
  }));
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}

/**
 * Keyword and regex driven tagging. Every category is checked on its own, so a
 * chunk collects as many tags as it matches.
 */
export class Tagger {
  private readonly statuses: CompiledCategory[];
  private readonly modes: CompiledCategory[];
  private readonly tagOnly: CompiledCategory[];
  private readonly metaTags: CompiledCategory[];
  private readonly sinnerPattern: RegExp;
  private readonly sinnerNames: Map<string, string>;

  constructor(rules: TagRules = tagRules) {
    this.statuses = compileTable(rules.statuses);
    this.modes = compileTable(rules.modes);
    this.tagOnly = [
      ...compileTable(rules.mechanics),
      ...compileTable(rules.identities),
      ...compileTable(rules.teams),
    ];
    this.metaTags = rules.metaTags.map((meta) => ({
      label: meta.tag,
      pattern: new RegExp(meta.pattern, meta.flags.replace(/g/g, '')),
    }));

    this.sinnerNames = new Map();
    const variants: string[] = [];
    for (const sinner of rules.sinners) {
      for (const variant of sinner.variants) {
        variants.push(variant);
        this.sinnerNames.set(variant.toLowerCase(), sinner.name);
      }
    }
    this.sinnerPattern = compileAlternation(variants, 'gi');
  }

  tag(content: string): TagResult {
    const tags = new Set<string>();
    const entities = emptyEntities();

    for (const { label, pattern } of this.statuses) {
      if (pattern.test(content)) {
        tags.add(statusTag(label));
        pushUnique(entities.statuses, label);
      }
    }

    for (const { label, pattern } of this.modes) {
      if (pattern.test(content)) {
        tags.add(label);
        pushUnique(entities.modes, label);
      }
    }

    for (const { label, pattern } of this.tagOnly) {
      if (pattern.test(content)) {
        tags.add(label);
      }
    }

    for (const match of content.matchAll(this.sinnerPattern)) {
      const name = this.normalizeSinnerName(match[0]);
      if (!entities.sinners.includes(name)) {
        entities.sinners.push(name);
        tags.add(sinnerTag(name));
      }
    }

    if (EGO_MENTION_REGEX.test(content)) {
      tags.add(EGO_TAG);
      for (const match of content.matchAll(EGO_NAME_REGEX)) {
        pushUnique(entities.egos, match[1]);
      }
    }

    for (const match of content.matchAll(IDENTITY_NAME_REGEX)) {
      pushUnique(entities.identities, match[1]);
    }

    for (const { label, pattern } of this.metaTags) {
      if (pattern.test(content)) {
        tags.add(label);
      }
    }

    return { tags: [...tags], entities };
  }

  /** Overwrites tags and entities on every chunk; re-tagging gives the same result. */
  tagMany<T extends ChunkDraft>(chunks: readonly T[]): Array<T & TaggedChunk> {
    return chunks.map((chunk) => ({ ...chunk, ...this.tag(chunk.content) }));
  }

  normalizeSinnerName(name: string): string {
    return this.sinnerNames.get(name.toLowerCase().trim()) ?? name;
  }
}

/** Tag occurrences across chunks, most frequent first. */
export function getTagStatistics(chunks: ReadonlyArray<{ tags: readonly string[] }>): Array<[string, number]> {
  const stats = new Map<string, number>();
  for (const chunk of chunks) {
    for (const tag of chunk.tags) {
      stats.set(tag, (stats.get(tag) ?? 0) + 1);
    }
  }
  return [...stats.entries()].sort((a, b) => b[1] - a[1]);
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

/** Intent tags for a search query, using the reduced query keyword tables. */
export function extractQueryTags(query: string, rules: TagRules = tagRules): Set<string> {
  const tags = new Set<string>();
  const lowered = query.toLowerCase();

  for (const [status, keywords] of Object.entries(rules.query.statuses)) {
    if (containsAny(lowered, keywords)) {
      tags.add(statusTag(status));
    }
  }

  for (const [mode, keywords] of Object.entries(rules.query.modes)) {
    if (containsAny(lowered, keywords)) {
      tags.add(mode);
    }
  }

  for (const group of rules.query.groups) {
    if (containsAny(lowered, group.keywords)) {
      group.tags.forEach((tag) => tags.add(tag));
    }
  }

  return tags;
}
