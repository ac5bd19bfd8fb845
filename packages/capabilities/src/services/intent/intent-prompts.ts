export const YES_NO_PROMPTS = {
  correction: `Determine if this message is trying to CORRECT previously stored information about the user.
Return true if the user is correcting something the bot got wrong, stating that something is incorrect, or clarifying information that contradicts what was said before.`,
  game: `Determine if this message is trying to START or PLAY a number guessing GAME, directly or indirectly.`,
  endGame: `Determine if this message is trying to END, STOP or QUIT a GAME that is in progress, directly or indirectly.`,
  userInfo: `Determine if this message is asking to SEE the user's own stored information, i.e. what the bot knows or remembers about them.`,
} as const;

export type YesNoCategory = keyof typeof YES_NO_PROMPTS;

export function yesNoPrompt(category: YesNoCategory, message: string): string {
  return `${YES_NO_PROMPTS[category]}

Respond with JSON only: {"result": true} or {"result": false}

Message: ${message}`;
}

export function forgetPrompt(message: string): string {
  return `Determine if this message is asking to DELETE previously stored information about the user.

If it is, respond with JSON: {"intent": true, "target": "what should be forgotten"}
If everything should be forgotten: {"intent": true, "target": null}
If not, respond with JSON: {"intent": false, "target": null}

Examples:
- "delete my info about school" -> {"intent": true, "target": "school"}
- "can you not remember my birthday" -> {"intent": true, "target": "birthday"}
- "remove everything" -> {"intent": true, "target": null}
- "what's up" -> {"intent": false, "target": null}

Message: ${message}`;
}

export function argumentativePrompt(message: string): string {
  return `Determine if this message is argumentative toward, insulting, or challenging the person it is addressed to.
Self-deprecating messages ("i suck at this") are NOT argumentative.

Respond with JSON only:
{"argumentative": true|false, "type": "insult" | "disagreement" | "criticism" | "challenge" | "general"}

Message: ${message}`;
}

export function guessPrompt(message: string): string {
  return `Extract a NUMERIC GUESS from this message if present. Convert written numbers to digits.

Respond with JSON only: {"guess": <integer>} or {"guess": null}

Examples:
- "I guess 42" -> {"guess": 42}
- "let me try ninety-nine" -> {"guess": 99}
- "what's up" -> {"guess": null}

Message: ${message}`;
}
