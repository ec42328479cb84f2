export const MIN_QUIZ_QUESTIONS = 1;
export const MAX_QUIZ_QUESTIONS = 50;

function resolveDefaultQuestionCount() {
  const configured = Number(process.env.QUIZ_DEFAULT_QUESTION_COUNT ?? 10);
  if (
    !Number.isInteger(configured) ||
    configured < MIN_QUIZ_QUESTIONS ||
    configured > MAX_QUIZ_QUESTIONS
  ) {
    return 10;
  }
  return configured;
}

export const DEFAULT_QUIZ_QUESTION_COUNT = resolveDefaultQuestionCount();

type SearchParamValue = string | string[] | null | undefined;

function firstValue(raw: SearchParamValue) {
  if (Array.isArray(raw)) {
    return raw[0];
  }
  return raw ?? undefined;
}

export function parseQuestionCount(raw: SearchParamValue) {
  const value = firstValue(raw);
  if (!value || !value.trim()) {
    return DEFAULT_QUIZ_QUESTION_COUNT;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error("Question count must be an integer.");
  }

  if (parsed < MIN_QUIZ_QUESTIONS || parsed > MAX_QUIZ_QUESTIONS) {
    throw new Error(
      `Question count must be between ${MIN_QUIZ_QUESTIONS} and ${MAX_QUIZ_QUESTIONS}.`,
    );
  }

  return parsed;
}

export function parseSeed(raw: SearchParamValue) {
  const value = firstValue(raw);
  if (!value || !value.trim()) {
    return null;
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error("Seed must be an integer.");
  }
  return parsed;
}

export function parseTopic(raw: SearchParamValue) {
  const value = firstValue(raw);
  return typeof value === "string" ? value.trim() : "";
}
