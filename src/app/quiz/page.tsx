import crypto from "node:crypto";
import type { ReactNode } from "react";
import AppHeader from "@/app/components/AppHeader";
import SourceErrorNotice from "@/app/components/SourceErrorNotice";
import QuizRunner from "@/app/quiz/QuizRunner";
import { loadFlashcards } from "@/lib/flashcards/loader";
import { listTopics } from "@/lib/flashcards/store";
import { quizEligibleCards } from "@/lib/flashcards/validation";
import { generateQuizQuestions } from "@/lib/quiz/generation";
import type { QuizQuestion } from "@/lib/quiz/types";
import {
  MAX_QUIZ_QUESTIONS,
  MIN_QUIZ_QUESTIONS,
  parseQuestionCount,
  parseSeed,
  parseTopic,
} from "@/lib/quiz/validation";

export const dynamic = "force-dynamic";

type SearchParams = {
  topic?: string;
  count?: string;
  seed?: string;
  start?: string;
};

function Shell({ children }: { children: ReactNode }) {
  return (
    <div className="min-h-screen bg-slate-950 text-slate-100">
      <AppHeader activeNav="quiz" />
      <div className="mx-auto w-full max-w-3xl space-y-8 px-6 py-16">
        <header className="space-y-2">
          <p className="text-sm font-medium text-slate-400">Quiz</p>
          <h1 className="text-3xl font-semibold">Quiz Mode</h1>
        </header>
        {children}
      </div>
    </div>
  );
}

export default async function QuizPage({
  searchParams,
}: {
  searchParams?: Promise<SearchParams>;
}) {
  const resolvedSearchParams = (await searchParams) ?? {};
  const result = await loadFlashcards();

  if (!result.ok) {
    return (
      <Shell>
        <SourceErrorNotice reason={result.reason} message={result.message} />
      </Shell>
    );
  }

  const topics = listTopics(result.flashcards);
  if (topics.length === 0) {
    return (
      <Shell>
        <div className="rounded-2xl border border-white/10 bg-slate-900/60 p-4 text-sm text-slate-300">
          No topics found in the flashcards data.
        </div>
      </Shell>
    );
  }

  const requestedTopic = parseTopic(resolvedSearchParams.topic);
  const selectedTopic = topics.includes(requestedTopic) ? requestedTopic : topics[0];
  const shouldStart = resolvedSearchParams.start === "1" && Boolean(requestedTopic);

  let errorMessage: string | null = null;
  let questionCount: number | null = null;
  let seed: number | null = null;
  try {
    questionCount = parseQuestionCount(resolvedSearchParams.count);
    seed = parseSeed(resolvedSearchParams.seed);
  } catch (error) {
    errorMessage = error instanceof Error ? error.message : "Quiz settings are invalid.";
  }

  let questions: QuizQuestion[] | null = null;
  if (shouldStart && questionCount !== null && !errorMessage) {
    questions = generateQuizQuestions(
      requestedTopic,
      quizEligibleCards(result.flashcards),
      questionCount,
      { seed },
    );
  }

  return (
    <Shell>
      {errorMessage ? (
        <div
          role="alert"
          className="rounded-xl border border-rose-500/40 bg-rose-500/10 px-4 py-3 text-sm text-rose-100"
        >
          {errorMessage}
        </div>
      ) : null}

      <form method="get" action="/quiz" className="flex flex-wrap items-end gap-4">
        <input type="hidden" name="start" value="1" />
        <label className="flex flex-1 flex-col gap-2 text-sm text-slate-300">
          Choose a topic
          <select
            name="topic"
            defaultValue={selectedTopic}
            className="rounded-xl border border-white/10 bg-slate-900 px-3 py-2 text-slate-100"
          >
            {topics.map((topic) => (
              <option key={topic} value={topic}>
                {topic}
              </option>
            ))}
          </select>
        </label>
        <label className="flex w-32 flex-col gap-2 text-sm text-slate-300">
          Questions
          <input
            type="number"
            name="count"
            min={MIN_QUIZ_QUESTIONS}
            max={MAX_QUIZ_QUESTIONS}
            step={1}
            defaultValue={questionCount ?? undefined}
            className="rounded-xl border border-white/10 bg-slate-900 px-3 py-2 text-slate-100"
          />
        </label>
        <button
          type="submit"
          className="ui-motion-color rounded-xl bg-cyan-400/90 px-5 py-2.5 text-sm font-semibold text-slate-950 hover:bg-cyan-300"
        >
          Start Quiz
        </button>
      </form>

      {questions && questions.length === 0 ? (
        <div className="rounded-2xl border border-white/10 bg-slate-900/60 p-4 text-sm text-slate-300">
          No flashcards available for this selection.
        </div>
      ) : null}

      {questions && questions.length > 0 ? (
        <QuizRunner
          key={crypto.randomUUID()}
          topic={requestedTopic}
          questions={questions}
          restartHref={`/quiz?topic=${encodeURIComponent(requestedTopic)}`}
        />
      ) : null}
    </Shell>
  );
}
