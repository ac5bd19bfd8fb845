export type ArgumentType = 'insult' | 'disagreement' | 'criticism' | 'challenge' | 'general';

export const ARGUMENT_TYPES: readonly ArgumentType[] = [
  'insult',
  'disagreement',
  'criticism',
  'challenge',
  'general',
];

/** What the user is trying to do with a message. Exactly one per message. */
export type Intent =
  | { kind: 'command'; name: string; args: string[] }
  | { kind: 'gameGuess'; value: number }
  | { kind: 'gameStart'; maxRange?: number }
  | { kind: 'gameEnd' }
  | { kind: 'forget'; target?: string }
  | { kind: 'correction' }
  | { kind: 'userInfoRequest' }
  | { kind: 'argumentative'; argumentType: ArgumentType }
  | { kind: 'none' };

export type IntentKind = Intent['kind'];

export type IntentCategory =
  | 'correction'
  | 'forget'
  | 'game'
  | 'endGame'
  | 'userInfo'
  | 'argumentative'
  | 'guess';

export interface ForgetDetection {
  intent: boolean;
  target: string | null;
}

export interface ArgumentDetection {
  argumentative: boolean;
  argumentType: ArgumentType;
}

export function isArgumentType(value: unknown): value is ArgumentType {
  return typeof value === 'string' && ARGUMENT_TYPES.some((t) => t === value);
}
