export type CardKind = "word" | "expression" | "sentence";

export type Gender = "der" | "die" | "das";

export type ContextPair = {
  source: string;
  target: string;
};

export type Card = {
  readonly id: number;
  readonly kind: CardKind;
  readonly sourceText: string;
  readonly translations: readonly string[];
  readonly context?: Readonly<ContextPair>;
  readonly gender?: Gender;
  readonly plural?: string;
  readonly tip?: string;
  readonly audioFileName?: string;
};

export type BatchEvent =
  | { type: "start"; total: number }
  | { type: "progress"; current: number; total: number; word: string }
  | { type: "complete"; count: number; cards: Card[] }
  | { type: "error"; message: string };

export type GeneratePayload = {
  words: string[];
};

export type RegeneratePayload = {
  word: string;
  id: number;
};
