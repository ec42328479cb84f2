export type Flashcard = {
  id: string;
  topic: string;
  prompt: string;
  answer: string;
  difficulty?: string;
  tags?: string[];
  distractors?: string[];
};

export type FlashcardSourceFailure = "not_found" | "malformed";

export type FlashcardLoadResult =
  | { ok: true; flashcards: Flashcard[] }
  | { ok: false; reason: FlashcardSourceFailure; message: string };
