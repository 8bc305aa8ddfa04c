/**
 * Shared fixtures for Gemini service tests
 *
 * @see src/services/gemini
 */

import type { GenerateRequest, GenerativeModel } from '../../../src/services/gemini/model.js';

export const VALID_RESPONSE = {
  title: 'Sleep and Memory Consolidation in Adolescents',
  authors: ['A. Researcher', 'B. Scientist'],
  journal: 'Journal of Example Studies',
  year: 2023,
  background: 'Sleep supports memory.',
  methods: 'Randomized crossover trial.',
  results: 'Recall improved after sleep.',
  discussion: 'Effects were larger in younger participants.',
  limitations: 'Small sample.',
  conclusions: 'Sleep matters for learning.',
  strengths: 'Preregistered design.',
};

export const VALID_JSON = JSON.stringify(VALID_RESPONSE);

export function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

type Reply = string | Error;

/**
 * Model that plays back `replies` in order, repeating the last one
 */
export class ScriptedModel implements GenerativeModel {
  readonly name = 'scripted';
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly replies: Reply[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async generate(request: GenerateRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies[Math.min(this.requests.length - 1, this.replies.length - 1)];
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
