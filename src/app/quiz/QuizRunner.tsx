"use client";

import { useState } from "react";
import { useRouter } from "next/navigation";
import {
  SUBMIT_BEFORE_NEXT_MESSAGE,
  advanceQuizAttempt,
  isAnswerLocked,
  restartQuizAttempt,
  startQuizAttempt,
  submitQuizAnswer,
  summarizeQuizAttempt,
} from "@/lib/quiz/attempt";
import type { QuizAttemptUpdate, QuizQuestion } from "@/lib/quiz/types";

type QuizRunnerProps = {
  topic: string;
  questions: QuizQuestion[];
  restartHref: string;
};

export default function QuizRunner({ topic, questions, restartHref }: QuizRunnerProps) {
  const router = useRouter();
  const [attempt, setAttempt] = useState(() => startQuizAttempt(topic, questions));
  const [selected, setSelected] = useState<Record<number, string | undefined>>({});
  const [warning, setWarning] = useState<string | null>(null);

  function applyUpdate(update: QuizAttemptUpdate) {
    if (!update.ok) {
      setWarning(update.error);
      return;
    }
    setWarning(null);
    setAttempt(update.attempt);
  }

  function handleNext() {
    if (!isAnswerLocked(attempt, attempt.currentIndex)) {
      setWarning(SUBMIT_BEFORE_NEXT_MESSAGE);
      return;
    }
    applyUpdate(advanceQuizAttempt(attempt));
  }

  function handleRestart() {
    setAttempt(restartQuizAttempt());
    setSelected({});
    setWarning(null);
    router.push(restartHref);
  }

  if (attempt.status === "not_started") {
    return <p className="text-sm text-slate-400">Quiz reset. Choose a topic to start again.</p>;
  }

  if (attempt.status === "finished") {
    const summary = summarizeQuizAttempt(attempt);
    return (
      <section className="space-y-6">
        <div className="space-y-2">
          <h2 className="text-2xl font-semibold">Quiz Results</h2>
          <p className="text-sm text-slate-300">
            Your score: <strong>{summary.scoreLabel}</strong>
          </p>
        </div>
        <div className="overflow-x-auto rounded-2xl border border-white/10 bg-slate-900/60">
          <table className="w-full text-left text-sm">
            <thead className="text-xs text-slate-400">
              <tr>
                <th className="px-4 py-3">Question #</th>
                <th className="px-4 py-3">Your answer</th>
                <th className="px-4 py-3">Correct answer</th>
                <th className="px-4 py-3">Correct?</th>
              </tr>
            </thead>
            <tbody>
              {summary.rows.map((row) => (
                <tr key={row.questionNumber} className="border-t border-white/10">
                  <td className="px-4 py-3">{row.questionNumber}</td>
                  <td className="px-4 py-3">{row.yourAnswer}</td>
                  <td className="px-4 py-3">{row.correctAnswer}</td>
                  <td className="px-4 py-3">{row.isCorrect ? "✅" : "❌"}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
        <button
          type="button"
          onClick={handleRestart}
          className="ui-motion-color rounded-xl bg-cyan-400/90 px-5 py-3 text-sm font-semibold text-slate-950 hover:bg-cyan-300"
        >
          Restart Quiz
        </button>
      </section>
    );
  }

  const index = attempt.currentIndex;
  const question = attempt.questions[index];
  const locked = isAnswerLocked(attempt, index);
  const choice = locked ? attempt.answers[index] : selected[index];

  return (
    <section className="space-y-6">
      {warning ? (
        <div
          role="alert"
          className="rounded-xl border border-amber-500/40 bg-amber-500/10 px-4 py-3 text-sm text-amber-100"
        >
          {warning}
        </div>
      ) : null}

      <div className="space-y-2">
        <p className="text-sm font-semibold text-slate-300">
          Question {index + 1} of {attempt.questions.length}
        </p>
        <p className="text-lg text-slate-100">{question.prompt}</p>
      </div>

      <fieldset className="space-y-2" disabled={locked}>
        <legend className="mb-2 text-xs text-slate-400">Select one answer</legend>
        {question.options.map((option) => (
          <label
            key={option}
            className="flex items-center gap-3 rounded-xl border border-white/10 bg-slate-900/60 px-4 py-3 text-sm text-slate-100"
          >
            <input
              type="radio"
              name={`question-${index}`}
              value={option}
              checked={choice === option}
              onChange={() => setSelected((current) => ({ ...current, [index]: option }))}
            />
            {option}
          </label>
        ))}
      </fieldset>

      <div className="flex flex-wrap items-center gap-3">
        {locked ? (
          <p className="text-sm text-emerald-200">Answer submitted.</p>
        ) : (
          <button
            type="button"
            onClick={() => applyUpdate(submitQuizAnswer(attempt, index, selected[index]))}
            className="ui-motion-color rounded-xl bg-cyan-400/90 px-5 py-3 text-sm font-semibold text-slate-950 hover:bg-cyan-300"
          >
            Submit Answer
          </button>
        )}
        <button
          type="button"
          onClick={handleNext}
          className="ui-motion-color rounded-xl border border-white/10 px-5 py-3 text-sm text-slate-200 hover:border-white/30 hover:bg-white/5"
        >
          {index >= attempt.questions.length - 1 ? "Finish" : "Next"}
        </button>
      </div>
    </section>
  );
}
