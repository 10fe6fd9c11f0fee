/**
 * Prompt Templates - Prompts for answering questions over résumé excerpts
 */

// =============================================================================
// RETRIEVAL QA PROMPTS
// =============================================================================

export const RETRIEVAL_QA_PROMPTS = {
  answer: {
    system: `You are an assistant helping a recruiter review candidate résumés.

Answer only from the résumé excerpts you are given. When the excerpts do not
contain the answer, say so plainly. Name the source document of every fact
you use. Answer in {{language}}.`,

    user: `## Résumé excerpts
{{context}}

## Question
{{question}}`,
  },
};

// =============================================================================
// HELPER TO BUILD PROMPTS
// =============================================================================

export type PromptVariables = Record<string, unknown>;

export function buildPrompt(template: string, variables: PromptVariables): string {
  let result = template;

  for (const [key, value] of Object.entries(variables)) {
    const placeholder = `{{${key}}}`;
    const replacement = typeof value === 'string' ? value : JSON.stringify(value, null, 2);
    result = result.split(placeholder).join(replacement);
  }

  return result;
}

export function buildPromptPair(
  template: { system: string; user: string },
  variables: PromptVariables
): { system: string; user: string } {
  return {
    system: buildPrompt(template.system, variables),
    user: buildPrompt(template.user, variables),
  };
}
