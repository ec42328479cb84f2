import { describe, expect, it, vi } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import QuizRunner from "@/app/quiz/QuizRunner";

vi.mock("next/navigation", () => ({
  useRouter: () => ({ push: vi.fn() }),
}));

describe("QuizRunner", () => {
  it("renders the first question with its options", () => {
    const html = renderToStaticMarkup(
      <QuizRunner
        topic="Math"
        restartHref="/quiz?topic=Math"
        questions={[
          {
            flashcardId: "a1",
            prompt: "2+2?",
            options: ["6", "4", "Option 1", "Option 2"],
            correctAnswer: "4",
          },
          {
            flashcardId: "a2",
            prompt: "3+3?",
            options: ["4", "6", "Option 2", "Option 1"],
            correctAnswer: "6",
          },
        ]}
      />,
    );

    expect(html).toContain("Question 1 of 2");
    expect(html).toContain("2+2?");
    expect(html).toContain('value="Option 2"');
    expect(html).toContain("Submit Answer");
    expect(html).toContain(">Next<");
    expect(html).not.toContain("3+3?");
  });

  it("labels the last question's button as finish", () => {
    const html = renderToStaticMarkup(
      <QuizRunner
        topic="Math"
        restartHref="/quiz?topic=Math"
        questions={[
          { flashcardId: "a1", prompt: "2+2?", options: ["6", "4", "5", "3"], correctAnswer: "4" },
        ]}
      />,
    );

    expect(html).toContain(">Finish<");
  });
});
