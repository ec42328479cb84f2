import type {
  QuizAttempt,
  QuizAttemptUpdate,
  QuizQuestion,
  QuizResultRow,
} from "@/lib/quiz/types";

export const NO_ANSWER_LABEL = "<no answer>";
export const SUBMIT_BEFORE_NEXT_MESSAGE =
  "Please submit an answer before moving to the next question.";

export function createQuizAttempt(): QuizAttempt {
  return {
    status: "not_started",
    topic: null,
    questions: [],
    currentIndex: 0,
    answers: [],
    score: 0,
  };
}

export function startQuizAttempt(topic: string, questions: readonly QuizQuestion[]): QuizAttempt {
  return {
    status: "in_progress",
    topic,
    questions: [...questions],
    currentIndex: 0,
    answers: questions.map(() => null),
    score: 0,
  };
}

export function isAnswerLocked(attempt: QuizAttempt, index: number) {
  return attempt.answers[index] !== null && attempt.answers[index] !== undefined;
}

export function submitQuizAnswer(
  attempt: QuizAttempt,
  index: number,
  choice: string | null | undefined,
): QuizAttemptUpdate {
  if (attempt.status !== "in_progress") {
    return { ok: false, error: "Start a quiz before submitting answers." };
  }
  if (!Number.isInteger(index) || index < 0 || index >= attempt.questions.length) {
    return { ok: false, error: "Question not found." };
  }
  if (typeof choice !== "string" || !choice.trim()) {
    return { ok: false, error: "Please select an option before submitting." };
  }
  if (isAnswerLocked(attempt, index)) {
    return { ok: false, error: "This question has already been answered." };
  }

  const answers = [...attempt.answers];
  answers[index] = choice;
  const isCorrect = choice === attempt.questions[index].correctAnswer;

  return {
    ok: true,
    attempt: {
      ...attempt,
      answers,
      score: isCorrect ? attempt.score + 1 : attempt.score,
    },
  };
}

export function advanceQuizAttempt(attempt: QuizAttempt): QuizAttemptUpdate {
  if (attempt.status !== "in_progress") {
    return { ok: false, error: "There is no quiz in progress." };
  }

  const lastIndex = attempt.questions.length - 1;
  if (attempt.currentIndex < lastIndex) {
    return { ok: true, attempt: { ...attempt, currentIndex: attempt.currentIndex + 1 } };
  }
  return { ok: true, attempt: { ...attempt, status: "finished" } };
}

export function restartQuizAttempt(): QuizAttempt {
  return createQuizAttempt();
}

export function summarizeQuizAttempt(attempt: QuizAttempt) {
  const rows: QuizResultRow[] = attempt.questions.map((question, index) => {
    const yourAnswer = attempt.answers[index] ?? null;
    return {
      questionNumber: index + 1,
      prompt: question.prompt,
      yourAnswer: yourAnswer ?? NO_ANSWER_LABEL,
      correctAnswer: question.correctAnswer,
      isCorrect: yourAnswer === question.correctAnswer,
    };
  });

  return {
    rows,
    score: attempt.score,
    total: attempt.questions.length,
    scoreLabel: `${attempt.score} / ${attempt.questions.length}`,
  };
}
