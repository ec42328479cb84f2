import { describe, expect, it, vi } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import QuizPage from "@/app/quiz/page";

const { loadFlashcardsMock } = vi.hoisted(() => ({ loadFlashcardsMock: vi.fn() }));

vi.mock("@/lib/flashcards/loader", () => ({
  loadFlashcards: loadFlashcardsMock,
}));

vi.mock("next/navigation", () => ({
  useRouter: () => ({ push: vi.fn() }),
}));

const flashcards = [
  { id: "a1", topic: "Math", prompt: "2+2?", answer: "4" },
  { id: "a2", topic: "Math", prompt: "3+3?", answer: "6" },
  { id: "b1", topic: "Biology", prompt: "Genetic material?", answer: "DNA" },
];

describe("QuizPage", () => {
  it("renders the setup form before a quiz starts", async () => {
    loadFlashcardsMock.mockResolvedValueOnce({ ok: true, flashcards });

    const html = renderToStaticMarkup(await QuizPage({}));

    expect(html).toContain("Quiz Mode");
    expect(html).toContain("Choose a topic");
    expect(html).toContain('<option value="Biology"');
    expect(html).toContain("Start Quiz");
    expect(html).not.toContain("Question 1 of");
  });

  it("generates questions when started", async () => {
    loadFlashcardsMock.mockResolvedValueOnce({ ok: true, flashcards });

    const html = renderToStaticMarkup(
      await QuizPage({
        searchParams: Promise.resolve({ topic: "Math", count: "10", seed: "1", start: "1" }),
      }),
    );

    expect(html).toContain("Question 1 of 2");
    expect(html).toContain("Option 1");
    expect(html).toContain("Submit Answer");
  });

  it("shows the no-data state for a topic without cards", async () => {
    loadFlashcardsMock.mockResolvedValueOnce({ ok: true, flashcards });

    const html = renderToStaticMarkup(
      await QuizPage({ searchParams: Promise.resolve({ topic: "History", start: "1" }) }),
    );

    expect(html).toContain("No flashcards available for this selection.");
  });

  it("reports invalid settings", async () => {
    loadFlashcardsMock.mockResolvedValueOnce({ ok: true, flashcards });

    const html = renderToStaticMarkup(
      await QuizPage({
        searchParams: Promise.resolve({ topic: "Math", count: "abc", start: "1" }),
      }),
    );

    expect(html).toContain("Question count must be an integer.");
    expect(html).not.toContain("Question 1 of");
  });

  it("reports a missing data file", async () => {
    loadFlashcardsMock.mockResolvedValueOnce({
      ok: false,
      reason: "not_found",
      message: "Could not find flashcards.json. Make sure it exists.",
    });

    const html = renderToStaticMarkup(await QuizPage({}));

    expect(html).toContain("Could not find flashcards.json. Make sure it exists.");
    expect(html).not.toContain("Start Quiz");
  });
});
