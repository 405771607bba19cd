import { ValidationError, describeError } from './errors.js';
import { SeedKnowledgeSchema, type SeedKnowledge } from '../types/index.js';

/**
 * Parse a JSON seed file body: an array of `{ question, answer }`
 *
 * @throws ValidationError when the body is not valid JSON or not a seed list
 */
export function parseSeedKnowledge(json: string): SeedKnowledge {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(`Seed file is not valid JSON: ${describeError(error)}`);
  }

  const parsed = SeedKnowledgeSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid seed knowledge: ${problems}`);
  }
  return parsed.data;
}
