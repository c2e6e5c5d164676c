/**
 * Narrative data structures
 */

export type NarrativeSource = "ai" | "template";

export interface Narrative {
  text: string;
  source: NarrativeSource;
  provider: string; // generator name, or "template"
}
