import type { RandomSource } from "@/lib/random";

export type QuizQuestion = {
  flashcardId: string;
  prompt: string;
  options: string[];
  correctAnswer: string;
};

export type QuizGenerationOptions = {
  seed?: number | null;
  random?: RandomSource;
};

export type QuizAttemptStatus = "not_started" | "in_progress" | "finished";

export type QuizAttempt = {
  status: QuizAttemptStatus;
  topic: string | null;
  questions: QuizQuestion[];
  currentIndex: number;
  answers: Array<string | null>;
  score: number;
};

export type QuizAttemptUpdate = { ok: true; attempt: QuizAttempt } | { ok: false; error: string };

export type QuizResultRow = {
  questionNumber: number;
  prompt: string;
  yourAnswer: string;
  correctAnswer: string;
  isCorrect: boolean;
};
