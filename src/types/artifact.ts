/**
 * What an LLM generator hands back for one model: either finished text, or a
 * header and body to be joined by the caller.
 */
export type GeneratedArtifact =
  | { kind: "text"; text: string }
  | { kind: "structured"; header?: string; body: string };
