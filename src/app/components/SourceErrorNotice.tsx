import type { FlashcardSourceFailure } from "@/lib/flashcards/types";

type SourceErrorNoticeProps = {
  reason: FlashcardSourceFailure;
  message: string;
};

export default function SourceErrorNotice({ reason, message }: SourceErrorNoticeProps) {
  const title = reason === "not_found" ? "No flashcards data found." : "Flashcards data is malformed.";

  return (
    <div
      role="alert"
      className={`rounded-xl border px-4 py-3 text-sm ${
        reason === "not_found"
          ? "border-amber-500/40 bg-amber-500/10 text-amber-100"
          : "border-rose-500/40 bg-rose-500/10 text-rose-100"
      }`}
    >
      <p className="font-semibold">{title}</p>
      <p>{message}</p>
    </div>
  );
}
