/**
 * LLM output artifacts that leak into copied content: citation markers,
 * source links and stray URLs.
 */

export interface ArtifactPattern {
  name: string;
  source: string;
  /** Replacement for String.replace; '' removes the match */
  replacement: string;
}

export const ARTIFACT_PATTERNS: readonly ArtifactPattern[] = [
  { name: 'bracketed-citation', source: String.raw`\[oai_citation:\d+[^\]]*\]`, replacement: '' },
  { name: 'citation', source: String.raw`oai_citation:\d+`, replacement: '' },
  { name: 'source-marker', source: String.raw`【\d+†[^】]*】`, replacement: '' },
  { name: 'source-link', source: String.raw`Source: \[[^\]]*\]\(https?:\/\/[^)]*\)`, replacement: '' },
  { name: 'markdown-link', source: String.raw`\[([^\]]+)\]\(https?:\/\/[^)]*\)`, replacement: '$1' },
  { name: 'url', source: String.raw`https?:\/\/\S+`, replacement: '' },
  { name: 'article-path', source: String.raw`\S*com\/articles\/[^"\s]*`, replacement: '' }
];

/**
 * Names of the artifact patterns present in text.
 */
export function findArtifacts(text: string): string[] {
  return ARTIFACT_PATTERNS
    .filter(artifact => new RegExp(artifact.source).test(text))
    .map(artifact => artifact.name);
}

/**
 * Remove every artifact; `removed` counts the patterns that matched.
 */
export function stripArtifacts(text: string): { text: string; removed: number } {
  let cleaned = text;
  let removed = 0;
  for (const artifact of ARTIFACT_PATTERNS) {
    const next = cleaned.replace(new RegExp(artifact.source, 'g'), artifact.replacement);
    if (next !== cleaned) {
      removed++;
      cleaned = next;
    }
  }
  return { text: cleaned, removed };
}
