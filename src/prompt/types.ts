export type PromptLoadFailure = 'missing' | 'unreadable' | 'malformed' | 'invalid';

export type PromptLoadResult =
  | { ok: true; prompt: string }
  | { ok: false; reason: PromptLoadFailure; detail?: string };

/** On-disk shape of the prompt file */
export interface PromptFile {
  prompt: string;
}

/** Read side of the store, handed to the classifier */
export interface PromptSource {
  getPrompt(): string;
}
