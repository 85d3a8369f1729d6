/**
 * Service Key Resolver
 *
 * Derives the grouping key used by the contradiction detectors. Keys are
 * prefixed by category so unrelated services never collide, and spelling
 * variants inside a category merge when their Dice similarity reaches
 * `similarityThreshold`.
 *
 * The threshold trades precision for recall: lower values merge more variants
 * (risking false contradictions between distinct services), higher values keep
 * variants apart (risking missed contradictions). 0.8 is the default.
 *
 * @module analyzer/service-key
 */

import stringSimilarity from "string-similarity";
import type { AnalysisConfig } from "../config-schemas";
import type { Rule } from "./types";

export interface ServiceKeyOptions {
  similarityThreshold: number;
  maxKeyLength: number;
  defaultCategory: string;
}

// Tokens that carry no service identity
const NOISE = [
  /\b(?:kes|kshs?|sh)\.?\s*\d[\d,]*(?:\.\d+)?/gi,
  /\d[\d,]*(?:\.\d+)?\s*\/-/g,
  /\b(?:levels?|lvl|tiers?)\.?\s*(?:[1-9]|vi|iv|v|i{1,3})(?:\s*(?:-|to|and|,)\s*(?:[1-9]|vi|iv|v|i{1,3}))*\b/gi,
  /\bper\s+(?:session|visit|day|week|month|year|annum|procedure|consultation|scan|delivery)s?\b/gi,
];

/**
 * Normalize a description for keying: lowercase, no amounts or facility-tier
 * phrases, no punctuation, single spaces.
 */
export function normalizeServiceDescription(description: string): string {
  let text = description.toLowerCase();
  for (const pattern of NOISE) text = text.replace(pattern, " ");
  return text
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function serviceKeyOptionsFromConfig(config: AnalysisConfig): ServiceKeyOptions {
  return {
    similarityThreshold: config.serviceKey.similarityThreshold,
    maxKeyLength: config.serviceKey.maxKeyLength,
    defaultCategory: config.categories.defaultCategory,
  };
}

export class ServiceKeyResolver {
  // category -> representatives in registration order
  private readonly registry = new Map<string, string[]>();

  constructor(private readonly options: ServiceKeyOptions) {}

  private categoryPrefix(category?: string): string {
    const raw = (category ?? "").trim() || this.options.defaultCategory;
    return raw.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "") || "other";
  }

  private representativeFor(prefix: string, normalized: string): string {
    const reps = this.registry.get(prefix) ?? [];
    if (reps.includes(normalized)) return normalized;

    let best: { rep: string; score: number } | null = null;
    for (const rep of reps) {
      const score = stringSimilarity.compareTwoStrings(normalized, rep);
      if (score >= this.options.similarityThreshold && (!best || score > best.score)) {
        best = { rep, score };
      }
    }
    if (best) return best.rep;

    reps.push(normalized);
    this.registry.set(prefix, reps);
    return normalized;
  }

  private formatKey(prefix: string, representative: string): string {
    const body = representative.replace(/ /g, "_") || "unspecified";
    return `${prefix}_${body}`.slice(0, this.options.maxKeyLength).replace(/_+$/, "");
  }

  /**
   * Resolve one description. Results depend on what was registered before;
   * use `resolveAll` for order-independent keys over a rule set.
   */
  resolve(description: string, category?: string): string {
    const prefix = this.categoryPrefix(category);
    return this.formatKey(prefix, this.representativeFor(prefix, normalizeServiceDescription(description)));
  }

  /**
   * Assign keys to every rule. Descriptions are registered in sorted order, so the
   * result does not depend on the order of the input rules.
   */
  resolveAll(rules: Rule[]): Rule[] {
    const pairs = new Map<string, { prefix: string; normalized: string }>();
    for (const rule of rules) {
      const prefix = this.categoryPrefix(rule.category);
      const normalized = normalizeServiceDescription(rule.service);
      pairs.set(`${prefix}\u0000${normalized}`, { prefix, normalized });
    }

    const resolved = new Map<string, string>();
    for (const id of [...pairs.keys()].sort()) {
      const pair = pairs.get(id);
      if (!pair) continue;
      resolved.set(id, this.formatKey(pair.prefix, this.representativeFor(pair.prefix, pair.normalized)));
    }

    return rules.map((rule) => {
      const id = `${this.categoryPrefix(rule.category)}\u0000${normalizeServiceDescription(rule.service)}`;
      return { ...rule, service_key: resolved.get(id) ?? this.resolve(rule.service, rule.category) };
    });
  }
}
