import Link from "next/link";
import AppHeader from "@/app/components/AppHeader";
import SourceErrorNotice from "@/app/components/SourceErrorNotice";
import { loadFlashcards } from "@/lib/flashcards/loader";
import { cardsForTopic, listTopics } from "@/lib/flashcards/store";

export const dynamic = "force-dynamic";

export default async function DashboardPage() {
  const result = await loadFlashcards();
  const flashcards = result.ok ? result.flashcards : [];
  const topics = listTopics(flashcards);

  return (
    <div className="min-h-screen bg-slate-950 text-slate-100">
      <AppHeader activeNav="dashboard" />
      <div className="mx-auto w-full max-w-6xl space-y-8 px-6 py-16">
        <header className="space-y-2">
          <p className="text-sm font-medium text-slate-400">Dashboard</p>
          <h1 className="text-3xl font-semibold">Flashcard &amp; Quizzes Dashboard</h1>
        </header>

        {!result.ok ? <SourceErrorNotice reason={result.reason} message={result.message} /> : null}

        <section className="space-y-4">
          <h2 className="text-lg font-semibold text-slate-200">Revision Topics</h2>
          {result.ok && topics.length === 0 ? (
            <div className="rounded-2xl border border-white/10 bg-slate-900/60 p-4 text-sm text-slate-300">
              No revision topics available.
            </div>
          ) : null}
          <ul className="grid gap-4 md:grid-cols-2">
            {topics.map((topic) => {
              const cardCount = cardsForTopic(flashcards, topic).length;
              const encodedTopic = encodeURIComponent(topic);
              return (
                <li
                  key={topic}
                  className="ui-motion-lift flex items-center justify-between gap-4 rounded-3xl border border-white/10 bg-slate-900/60 p-6 hover:-translate-y-0.5 hover:border-cyan-400/30"
                >
                  <div>
                    <p className="text-base font-semibold">{topic}</p>
                    <p className="text-xs text-slate-400">
                      {cardCount} {cardCount === 1 ? "card" : "cards"}
                    </p>
                  </div>
                  <div className="flex gap-2">
                    <Link
                      href={`/study/${encodedTopic}`}
                      className="ui-motion-color rounded-xl border border-white/10 px-4 py-2 text-xs font-semibold text-slate-200 hover:border-white/30 hover:bg-white/5"
                    >
                      Study
                    </Link>
                    <Link
                      href={`/quiz?topic=${encodedTopic}`}
                      className="ui-motion-color rounded-xl bg-cyan-400/90 px-4 py-2 text-xs font-semibold text-slate-950 hover:bg-cyan-300"
                    >
                      Quiz
                    </Link>
                  </div>
                </li>
              );
            })}
          </ul>
        </section>
      </div>
    </div>
  );
}
