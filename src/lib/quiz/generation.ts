import { cardsForTopic } from "@/lib/flashcards/store";
import type { Flashcard } from "@/lib/flashcards/types";
import { createRandom, sample, shuffle } from "@/lib/random";
import type { RandomSource } from "@/lib/random";
import type { QuizGenerationOptions, QuizQuestion } from "@/lib/quiz/types";

export const OPTIONS_PER_QUESTION = 4;
export const DISTRACTORS_PER_QUESTION = OPTIONS_PER_QUESTION - 1;

function fillerLabel(counter: number) {
  return `Option ${counter}`;
}

function padWithFiller(values: string[], correctAnswer: string, target: number) {
  let counter = 1;
  while (values.length < target) {
    const candidate = fillerLabel(counter);
    if (candidate !== correctAnswer && !values.includes(candidate)) {
      values.push(candidate);
    }
    counter += 1;
  }
}

function pullAnswers(input: {
  pool: readonly Flashcard[];
  correctAnswer: string;
  chosen: string[];
  target: number;
  random: RandomSource;
}) {
  const candidates = input.pool
    .map((card) => card.answer)
    .filter((answer) => Boolean(answer) && answer !== input.correctAnswer);

  for (const candidate of shuffle(candidates, input.random)) {
    if (input.chosen.length >= input.target) {
      return;
    }
    if (!input.chosen.includes(candidate)) {
      input.chosen.push(candidate);
    }
  }
}

/**
 * Author-supplied distractors first, then other answers from the same topic,
 * then answers from the whole collection, then `Option N` filler.
 */
export function collectDistractors(input: {
  flashcard: Flashcard;
  sameTopicPool: readonly Flashcard[];
  globalPool: readonly Flashcard[];
  random: RandomSource;
  count?: number;
}) {
  const target = input.count ?? DISTRACTORS_PER_QUESTION;
  const correctAnswer = input.flashcard.answer;
  const chosen: string[] = [];

  for (const distractor of input.flashcard.distractors ?? []) {
    if (chosen.length >= target) {
      break;
    }
    if (distractor && distractor !== correctAnswer && !chosen.includes(distractor)) {
      chosen.push(distractor);
    }
  }

  if (chosen.length < target) {
    pullAnswers({ pool: input.sameTopicPool, correctAnswer, chosen, target, random: input.random });
  }
  if (chosen.length < target) {
    pullAnswers({ pool: input.globalPool, correctAnswer, chosen, target, random: input.random });
  }

  padWithFiller(chosen, correctAnswer, target);
  return chosen.slice(0, target);
}

/**
 * Dedupes the answer and its distractors, tops up from the whole collection
 * when the distractors repeat each other or the answer, then pads and shuffles.
 * `collectDistractors` already returns distinct values, so the top-up only runs
 * for distractor lists built some other way.
 */
export function assembleOptions(input: {
  flashcard: Flashcard;
  distractors: readonly string[];
  globalPool: readonly Flashcard[];
  random: RandomSource;
}) {
  const correctAnswer = input.flashcard.answer;
  const options = [...new Set([correctAnswer, ...input.distractors])];

  if (options.length < OPTIONS_PER_QUESTION) {
    const extras = input.globalPool
      .map((card) => card.answer)
      .filter((answer) => Boolean(answer) && !options.includes(answer));
    for (const extra of shuffle(extras, input.random)) {
      if (options.length >= OPTIONS_PER_QUESTION) {
        break;
      }
      if (!options.includes(extra)) {
        options.push(extra);
      }
    }
  }

  padWithFiller(options, correctAnswer, OPTIONS_PER_QUESTION);
  return shuffle(options, input.random);
}

function resolveRandom(options: number | QuizGenerationOptions | undefined) {
  if (typeof options === "number") {
    return createRandom(options);
  }
  return options?.random ?? createRandom(options?.seed);
}

/**
 * Builds up to `numQuestions` multiple-choice questions for `topic`.
 *
 * `allFlashcards` is both the source of the topic's cards and the fallback
 * distractor pool. Passing a seed (or a `random` source) makes the whole run
 * reproducible.
 */
export function generateQuizQuestions(
  topic: string,
  allFlashcards: readonly Flashcard[],
  numQuestions: number,
  randomSeed?: number | QuizGenerationOptions,
): QuizQuestion[] {
  // Infinity passes through and asks for every card of the topic.
  const limit = Math.floor(numQuestions);
  if (Number.isNaN(limit) || limit < 1) {
    return [];
  }

  const topicPool = cardsForTopic(allFlashcards, topic);
  if (topicPool.length === 0) {
    return [];
  }

  const random = resolveRandom(randomSeed);
  const chosen =
    topicPool.length <= limit ? shuffle(topicPool, random) : sample(topicPool, limit, random);

  return chosen.map((flashcard) => {
    const sameTopicPool = topicPool.filter((card) => card.id !== flashcard.id);
    const distractors = collectDistractors({
      flashcard,
      sameTopicPool,
      globalPool: allFlashcards,
      random,
    });

    return {
      flashcardId: flashcard.id,
      prompt: flashcard.prompt,
      options: assembleOptions({ flashcard, distractors, globalPool: allFlashcards, random }),
      correctAnswer: flashcard.answer,
    };
  });
}
