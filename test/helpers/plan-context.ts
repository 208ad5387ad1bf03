import type { PlanContext, SuggestionInput } from '../../src/agents/types.js';

/** PlanContext that keeps every suggestion it is handed */
export function recordingContext(): PlanContext & { suggestions: SuggestionInput[] } {
  const suggestions: SuggestionInput[] = [];
  return {
    suggestions,
    async suggest(input: SuggestionInput): Promise<boolean> {
      suggestions.push(input);
      return true;
    },
  };
}
