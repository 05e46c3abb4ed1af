/**
 * Model metadata: context windows, default output reservations and tokenizers.
 */

import { z } from 'zod';
import seed from './models.json';

export const TOKENIZER_KINDS = ['claude', 'gpt', 'gemini', 'heuristic'] as const;

export type TokenizerKind = (typeof TOKENIZER_KINDS)[number];

const ModelInfoSchema = z.object({
  name: z.string().min(1),
  contextWindowTokens: z.number().int().positive(),
  defaultMaxOutputTokens: z.number().int().positive(),
  tokenizer: z.enum(TOKENIZER_KINDS),
  provider: z.string().min(1),
  supportsThinking: z.boolean().default(false),
  supportsTools: z.boolean().default(true),
});

const CatalogFileSchema = z.object({
  models: z.array(ModelInfoSchema),
});

export type ModelInfo = z.infer<typeof ModelInfoSchema>;

/** Catalog entry as written by hand; capability flags may be omitted */
export type ModelInfoInput = z.input<typeof ModelInfoSchema>;

export const FALLBACK_CONTEXT_WINDOW = 128000;
export const FALLBACK_MAX_OUTPUT = 4096;

function familyPrefix(name: string): string {
  return name.split('-').slice(0, 3).join('-');
}

export class ModelCatalog {
  private models = new Map<string, ModelInfo>();

  /**
   * @param entries - seed models; defaults to the bundled catalog
   */
  constructor(entries?: ModelInfoInput[]) {
    for (const info of entries ?? ModelCatalog.bundled()) {
      this.register(info);
    }
  }

  static bundled(): ModelInfo[] {
    return CatalogFileSchema.parse(seed).models;
  }

  /**
   * Exact match, then prefix match in either direction
   * ("claude-sonnet-4-5" finds "claude-sonnet-4-5-20250929").
   * When several registered names match, the longest one wins.
   */
  get(model: string): ModelInfo | undefined {
    const exact = this.models.get(model);
    if (exact) return exact;
    if (!model) return undefined;

    let best: ModelInfo | undefined;
    for (const [name, info] of this.models) {
      const matches = name.startsWith(model) || model.startsWith(familyPrefix(name));
      if (!matches) continue;
      if (!best || name.length > best.name.length || (name.length === best.name.length && name < best.name)) {
        best = info;
      }
    }
    return best;
  }

  /**
   * Never fails: unknown models get a conservative heuristic profile
   */
  infoFor(model: string): ModelInfo {
    return this.get(model) ?? {
      name: model,
      contextWindowTokens: FALLBACK_CONTEXT_WINDOW,
      defaultMaxOutputTokens: FALLBACK_MAX_OUTPUT,
      tokenizer: 'heuristic',
      provider: 'unknown',
      supportsThinking: false,
      supportsTools: true,
    };
  }

  register(info: ModelInfoInput): void {
    this.models.set(info.name, ModelInfoSchema.parse(info));
  }

  list(): string[] {
    return Array.from(this.models.keys()).sort();
  }

  providers(): string[] {
    return Array.from(new Set(Array.from(this.models.values(), m => m.provider))).sort();
  }

  modelsForProvider(provider: string): string[] {
    return Array.from(this.models.values())
      .filter(m => m.provider === provider)
      .map(m => m.name)
      .sort();
  }
}

let defaultCatalog: ModelCatalog | undefined;

export function getDefaultCatalog(): ModelCatalog {
  if (!defaultCatalog) {
    defaultCatalog = new ModelCatalog();
  }
  return defaultCatalog;
}
