export function factExtractionPrompt(message: string): string {
  return `Extract ONLY definite personal facts about the user from this message.
Respond with ONLY a JSON array of facts in second-person format.

Example message: "I am 21 years old and I hate math"
Example response: ["You are 21 years old", "You hate math"]

Example message: "My friend is a doctor"
Example response: ["Your friend is a doctor"]

Example message: "I don't eat meat anymore"
Example response: ["You do not eat meat"]

RULES:
- Include personal facts: preferences, status, relationships, possessions, age, location
- Use second-person format ("You are", "You have", "You like", "Your friend is")
- Do not include opinions about other things, temporary moods, or anything uncertain
- Return empty array [] if no clear facts are present

USER MESSAGE: ${message}`;
}

export function topicExtractionPrompt(message: string): string {
  return `Extract the core topics the user is interested in from this message.
Respond with ONLY a JSON array of short topic names (1-3 words, not sentences).
Return empty array [] if there are none.

Example message: "I like cats so much"
Example response: ["cats"]

Example message: "I'm into deep learning and mobile app development"
Example response: ["deep learning", "mobile app development"]

Example message: "I am not craving sushi anymore"
Example response: []

USER MESSAGE: ${message}`;
}

export function correctionPrompt(facts: readonly string[], correction: string): string {
  const numbered = facts.map((fact, i) => `${i + 1}. ${fact}`).join('\n');
  return `The user is trying to correct information we stored about them.
Given their message and the stored facts, decide which fact to change and how.

CURRENT FACTS:
${numbered}

CORRECTION: ${correction}

Respond with ONLY JSON:
{"action": "delete" | "update" | "none", "fact_index": <number of the fact as listed above>, "new_fact": "<updated fact in second person, only for update>"}

If the correction could match several facts, pick the most relevant one.
If it matches none or the intent is unclear, use "none".`;
}
