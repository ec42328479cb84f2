import type { Flashcard } from "@/lib/flashcards/types";

// Topics are listed alphabetically (plain string sort), not in first-seen order.
export function listTopics(cards: readonly Flashcard[]) {
  if (!Array.isArray(cards)) {
    return [];
  }

  const topics = new Set<string>();
  for (const card of cards) {
    if (card && typeof card.topic === "string" && card.topic) {
      topics.add(card.topic);
    }
  }

  return [...topics].sort();
}

export function cardsForTopic(cards: readonly Flashcard[], topic: string) {
  if (!Array.isArray(cards)) {
    return [];
  }
  return cards.filter((card) => Boolean(card) && card.topic === topic);
}
