import type { Flashcard } from "@/lib/flashcards/types";

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readText(value: unknown) {
  return typeof value === "string" ? value.trim() : "";
}

function readTextList(value: unknown) {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isNonEmptyString).map((entry) => entry.trim());
}

function synthesizeId(topic: string, position: number) {
  return topic ? `${topic}-${position}` : `card-${position}`;
}

export function normalizeFlashcardRecords(
  raw: unknown,
): { ok: true; value: Flashcard[] } | { ok: false; errors: string[] } {
  if (!Array.isArray(raw)) {
    return { ok: false, errors: ["Flashcards data must be a top-level JSON array."] };
  }

  const errors: string[] = [];
  const seenIds = new Set<string>();
  const flashcards: Flashcard[] = [];

  raw.forEach((entry, index) => {
    if (!isRecord(entry)) {
      errors.push(`flashcards[${index}] must be an object.`);
      return;
    }

    const position = index + 1;
    const topic = readText(entry.topic);
    const baseId = isNonEmptyString(entry.id) ? entry.id.trim() : synthesizeId(topic, position);
    let id = baseId;
    for (let attempt = 1; seenIds.has(id); attempt += 1) {
      id = attempt === 1 ? `${baseId}-${position}` : `${baseId}-${position}-${attempt}`;
    }
    seenIds.add(id);

    const card: Flashcard = {
      id,
      topic,
      prompt: readText(entry.prompt),
      answer: readText(entry.answer),
      tags: readTextList(entry.tags),
      distractors: readTextList(entry.distractors),
    };
    if (isNonEmptyString(entry.difficulty)) {
      card.difficulty = entry.difficulty.trim();
    }

    flashcards.push(card);
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: flashcards };
}

export function isQuizEligible(card: Flashcard) {
  return isNonEmptyString(card.answer);
}

export function quizEligibleCards(cards: readonly Flashcard[]) {
  return cards.filter(isQuizEligible);
}
