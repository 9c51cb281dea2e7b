import type { Rubric } from '../types/index.js';

export const REVIEWER_INSTRUCTION = `You are a Quality Assurance Reviewer for customer service replies.
You only see the reply itself, never the conversation that produced it.
Judge it on tone, accuracy of claims and compliance with the brand rubric.
Output only valid JSON.`;

export function buildLightReviewPrompt(draft: string, rubric: Rubric): string {
  return `Quick review of a short customer service reply.

Reply:
"""
${draft}
"""

Check that it is ${rubric.requiredTone}, makes no promises the company cannot keep and is not ${rubric.forbiddenTones.join(' or ')}.

Respond with a JSON object:
{"is_ok": true/false, "issue": "short description if not ok"}`;
}

export function buildFullReviewPrompt(draft: string, rubric: Rubric, knownIssues: readonly string[]): string {
  const known = knownIssues.length > 0
    ? `\nIssues already detected:\n${knownIssues.map(issue => `- ${issue}`).join('\n')}\n`
    : '';

  return `Review this customer service reply against the rubric.

Reply:
"""
${draft}
"""
${known}
Rubric:
- Required tone: ${rubric.requiredTone}
- Forbidden tones: ${rubric.forbiddenTones.join(', ')}
- Forbidden phrases: ${rubric.forbiddenPhrases.join(', ')}
- Forbidden promises: ${rubric.forbiddenPromises.join(', ')}
- Topics that need a careful, non-committal wording: ${rubric.disclaimerTopics.join(', ')}
- Length between ${rubric.minLength} and ${rubric.maxLength} characters

If the reply can be fixed by editing, provide the corrected text. Ask for a retry only
when the reply is unusable.

Respond with a JSON object:
{
  "is_acceptable": true/false,
  "issues_found": ["..."],
  "corrected_response": "fixed reply, or null when no change is needed",
  "changes_made": ["..."],
  "requires_retry": true/false
}`;
}
