import { EngineConfig, KeywordCategory, ScoringWeights } from "@/types";
import { readFileSync } from "fs";
import * as Joi from "joi";
import bundledTaxonomy from "./taxonomy.json";

interface TaxonomyFile {
  categories: KeywordCategory[];
}

interface EngineConfigInput {
  taxonomy?: readonly KeywordCategory[];
  weights: ScoringWeights;
  problemThreshold: number;
}

const taxonomySchema = Joi.object<TaxonomyFile>({
  categories: Joi.array()
    .items(
      Joi.object({
        name: Joi.string()
          .pattern(/^[a-z0-9_]+$/)
          .required(),
        description: Joi.string(),
        keywords: Joi.array()
          .items(
            Joi.string()
              .trim()
              .lowercase()
              .replace(/\s+/g, " ")
              .replace(/[’‘]/g, "'")
              .min(1)
          )
          .min(1)
          .unique()
          .required(),
      })
    )
    .min(1)
    .unique("name")
    .required(),
});

const weightsSchema = Joi.object<ScoringWeights>({
  keyword: Joi.number().min(0).required(),
  score: Joi.number().min(0).required(),
  comments: Joi.number().min(0).required(),
});

/**
 * Validates a taxonomy document and returns its categories, deep frozen.
 * A keyword may belong to one category only.
 */
export function parseTaxonomy(raw: unknown): readonly KeywordCategory[] {
  const validation = taxonomySchema
    .prefs({ errors: { label: "path" } })
    .validate(raw);

  if (validation.error) {
    throw new Error(`Taxonomy validation error: ${validation.error.message}`);
  }
  const value = validation.value;

  const owners = new Map<string, string>();
  for (const category of value.categories) {
    for (const keyword of category.keywords) {
      const owner = owners.get(keyword);
      if (owner !== undefined) {
        throw new Error(
          `Taxonomy validation error: keyword "${keyword}" is listed under both "${owner}" and "${category.name}"`
        );
      }
      owners.set(keyword, category.name);
    }
  }

  return Object.freeze(
    value.categories.map((category) =>
      Object.freeze({
        ...category,
        keywords: Object.freeze([...category.keywords]),
      })
    )
  );
}

export function loadTaxonomyFile(path: string): readonly KeywordCategory[] {
  const contents = readFileSync(path, "utf8");
  return parseTaxonomy(JSON.parse(contents));
}

export const defaultTaxonomy = parseTaxonomy(bundledTaxonomy);

/**
 * Builds the immutable configuration shared by the matcher and the scorer.
 * Built once at start-up; nothing reads the environment after this.
 */
export function buildEngineConfig(input: EngineConfigInput): EngineConfig {
  const taxonomy = input.taxonomy ?? defaultTaxonomy;

  const validation = weightsSchema.validate(input.weights);
  if (validation.error) {
    throw new Error(
      `Scoring weights validation error: ${validation.error.message}`
    );
  }
  const weights = validation.value;
  if (!Number.isFinite(input.problemThreshold) || input.problemThreshold < 0) {
    throw new Error(
      `Problem threshold must be a non-negative number, got ${input.problemThreshold}`
    );
  }

  return Object.freeze({
    taxonomy,
    weights: Object.freeze({ ...weights }),
    problemThreshold: input.problemThreshold,
  });
}
