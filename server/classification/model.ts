import fs from 'node:fs/promises';
import JSON5 from 'json5';
import { z } from 'zod';

/**
 * Opaque text → P(fabricated) capability. The pipeline never looks inside a model.
 */
export interface ProbabilityModel {
  readonly name: string;
  predictFabrication: (cleanedText: string) => number;
}

export interface ModelBundle {
  readonly article: ProbabilityModel;
  /** Optional model trained on short headlines; used below the headline length threshold. */
  readonly headline?: ProbabilityModel;
}

const LinearModelSchema = z
  .object({
    vocabulary: z.record(z.string(), z.number().int().nonnegative()),
    idf: z.array(z.number().finite()),
    coefficients: z.array(z.number().finite()),
    intercept: z.number().finite(),
    ngramRange: z.tuple([z.number().int().positive(), z.number().int().positive()]).default([1, 1]),
    sublinearTf: z.boolean().default(false),
  })
  .superRefine((model, ctx) => {
    const size = Object.keys(model.vocabulary).length;
    if (model.idf.length !== size) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `idf has ${model.idf.length} entries for ${size} terms` });
    }
    if (model.coefficients.length !== size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `coefficients has ${model.coefficients.length} entries for ${size} terms`,
      });
    }
    for (const [term, index] of Object.entries(model.vocabulary)) {
      if (index >= size) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `term "${term}" has out-of-range index ${index}` });
      }
    }
    if (model.ngramRange[0] > model.ngramRange[1]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'ngramRange must be ascending' });
    }
  });

export const ModelFileSchema = z.object({
  format: z.literal('tfidf-logistic'),
  version: z.number().int().positive(),
  description: z.string().optional(),
  article: LinearModelSchema,
  headline: LinearModelSchema.optional(),
});

export type LinearModelParams = z.infer<typeof LinearModelSchema>;
export type ModelFile = z.infer<typeof ModelFileSchema>;

export class ModelLoadError extends Error {
  constructor(message: string, readonly path: string) {
    super(message);
    this.name = 'ModelLoadError';
  }
}

const sigmoid = (value: number): number => 1 / (1 + Math.exp(-value));

const extractNgrams = (tokens: string[], [minN, maxN]: [number, number]): string[] => {
  const grams: string[] = [];
  for (let n = minN; n <= maxN; n += 1) {
    for (let i = 0; i + n <= tokens.length; i += 1) {
      grams.push(tokens.slice(i, i + n).join(' '));
    }
  }
  return grams;
};

/**
 * TF-IDF vectorizer plus logistic-regression head, the layout scikit-learn's
 * `TfidfVectorizer` + `LogisticRegression` export to. Coefficients are oriented so that the
 * sigmoid is the probability of the fabricated class.
 */
export class TfidfLogisticModel implements ProbabilityModel {
  private readonly vocabulary: ReadonlyMap<string, number>;
  private readonly idf: Float64Array;
  private readonly coefficients: Float64Array;
  private readonly intercept: number;
  private readonly ngramRange: [number, number];
  private readonly sublinearTf: boolean;

  constructor(readonly name: string, params: LinearModelParams) {
    this.vocabulary = new Map(Object.entries(params.vocabulary));
    this.idf = Float64Array.from(params.idf);
    this.coefficients = Float64Array.from(params.coefficients);
    this.intercept = params.intercept;
    this.ngramRange = [params.ngramRange[0], params.ngramRange[1]];
    this.sublinearTf = params.sublinearTf;
    Object.freeze(this);
  }

  get dimensions(): number {
    return this.idf.length;
  }

  vectorize(cleanedText: string): Float64Array {
    const vector = new Float64Array(this.dimensions);
    const tokens = cleanedText.split(' ').filter(Boolean);
    for (const gram of extractNgrams(tokens, this.ngramRange)) {
      const index = this.vocabulary.get(gram);
      if (index !== undefined) {
        vector[index] += 1;
      }
    }

    let norm = 0;
    for (let i = 0; i < vector.length; i += 1) {
      if (vector[i] === 0) continue;
      const tf = this.sublinearTf ? 1 + Math.log(vector[i]) : vector[i];
      vector[i] = tf * this.idf[i];
      norm += vector[i] * vector[i];
    }

    if (norm > 0) {
      const scale = 1 / Math.sqrt(norm);
      for (let i = 0; i < vector.length; i += 1) {
        vector[i] *= scale;
      }
    }
    return vector;
  }

  predictFabrication(cleanedText: string): number {
    const vector = this.vectorize(cleanedText);
    let logit = this.intercept;
    for (let i = 0; i < vector.length; i += 1) {
      logit += vector[i] * this.coefficients[i];
    }
    return sigmoid(logit);
  }
}

export const buildModelBundle = (file: ModelFile): ModelBundle =>
  Object.freeze({
    article: new TfidfLogisticModel('article', file.article),
    headline: file.headline ? new TfidfLogisticModel('headline', file.headline) : undefined,
  });

export const loadModelBundle = async (modelPath: string): Promise<ModelBundle> => {
  let raw: string;
  try {
    raw = await fs.readFile(modelPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ModelLoadError(`Unable to read model file: ${message}`, modelPath);
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ModelLoadError(`Model file is not valid JSON: ${message}`, modelPath);
  }

  const result = ModelFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ModelLoadError(`Model file failed validation: ${issues.join('; ')}`, modelPath);
  }
  return buildModelBundle(result.data);
};
