import "server-only";
import { readFile } from "node:fs/promises";
import path from "node:path";
import type { FlashcardLoadResult } from "@/lib/flashcards/types";
import { normalizeFlashcardRecords } from "@/lib/flashcards/validation";

const DEFAULT_DATA_PATH = path.join("data", "flashcards.json");

export function resolveFlashcardsDataPath() {
  return path.resolve(process.cwd(), process.env.FLASHCARDS_DATA_PATH ?? DEFAULT_DATA_PATH);
}

function isMissingFileError(error: unknown) {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export async function loadFlashcards(filePath = resolveFlashcardsDataPath()): Promise<FlashcardLoadResult> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return {
        ok: false,
        reason: "not_found",
        message: `Could not find ${path.basename(filePath)}. Make sure it exists.`,
      };
    }
    console.error("Failed to read flashcards data", {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {
      ok: false,
      reason: "malformed",
      message: "Failed to parse flashcards JSON. Please check the file format.",
    };
  }

  const normalized = normalizeFlashcardRecords(parsed);
  if (!normalized.ok) {
    return {
      ok: false,
      reason: "malformed",
      message: `Invalid flashcards data: ${normalized.errors.join("; ")}`,
    };
  }

  return { ok: true, flashcards: normalized.value };
}
