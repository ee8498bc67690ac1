import { z } from 'zod';
import rawRules from './data/tagRules.json';
import { capitalize } from './textUtils';

const keywordTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

const tagRulesSchema = z.object({
  statuses: keywordTableSchema,
  modes: keywordTableSchema,
  mechanics: keywordTableSchema,
  identities: keywordTableSchema,
  teams: keywordTableSchema,
  sinners: z.array(
    z.object({
      name: z.string().min(1),
      variants: z.array(z.string().min(1)).min(1),
    })
  ),
  metaTags: z.array(
    z.object({
      tag: z.string().min(1),
      pattern: z.string().min(1),
      flags: z.string(),
    })
  ),
  query: z.object({
    statuses: keywordTableSchema,
    modes: keywordTableSchema,
    groups: z.array(
      z.object({
        tags: z.array(z.string().min(1)).min(1),
        keywords: z.array(z.string().min(1)).min(1),
      })
    ),
  }),
});

export type KeywordTable = z.infer<typeof keywordTableSchema>;
export type TagRules = z.infer<typeof tagRulesSchema>;

export const tagRules: TagRules = tagRulesSchema.parse(rawRules);

export function statusTag(status: string): string {
  return `状态:${capitalize(status)}`;
}

export function sinnerTag(name: string): string {
  return `角色:${name}`;
}

export const EGO_TAG = 'EGO';
