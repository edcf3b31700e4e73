// Prompt template for clinical note generation

export const NOTE_SECTIONS = ['Subjective', 'Objective', 'Assessment', 'Plan'] as const;

export type NoteSection = (typeof NOTE_SECTIONS)[number];

// Replaces any name that could identify the client
export const CLIENT_PLACEHOLDER = '[CLIENT]';

// How the note refers to the professional who led the session
export const PROFESSIONAL_ROLE = 'Therapist';

const SYSTEM_PROMPT = `You are a clinical documentation assistant. You turn transcripts of therapy sessions into structured SOAP notes.

RULES:
1. Write the note in exactly four sections, in this order, each starting with its heading on its own line:
   Subjective:
   Objective:
   Assessment:
   Plan:
2. Replace every name of the client, and any other detail that would identify them, with ${CLIENT_PLACEHOLDER}.
3. Refer to the professional who led the session only as "${PROFESSIONAL_ROLE}", never by name.
4. Only document what is stated or clearly observable in the transcript. Do not invent findings, diagnoses or medications.
5. If a section has no supporting content in the transcript, write "Not discussed." under its heading.
6. Output plain text only - no markdown, no code blocks, no preamble or closing remarks.`;

export function getSystemPrompt(): string {
  return SYSTEM_PROMPT;
}

export function buildNotePrompt(transcript: string): string {
  return `Write a SOAP note for the following session transcript.

TRANSCRIPT:
"""
${transcript}
"""`;
}

/**
 * Section headings the note does not contain, in template order.
 */
export function missingSections(note: string): NoteSection[] {
  return NOTE_SECTIONS.filter(section => !new RegExp(`^\\s*${section}\\s*:`, 'im').test(note));
}
