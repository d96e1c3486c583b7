function asClause(description: string): string {
  const trimmed = description.trim().replace(/[.?!]+$/, '');
  // Keep acronyms ("HSA balance") intact
  if (/^\p{Lu}\p{Lu}/u.test(trimmed)) return trimmed;
  return trimmed.charAt(0).toLowerCase() + trimmed.slice(1);
}

/** Generic clarification used when the leading intent has no disambiguation prompt of its own. */
export function buildClarificationPrompt(descriptions: readonly string[]): string {
  const clauses = descriptions.map(asClause);
  if (clauses.length <= 1) {
    return `Just to confirm, are you asking about ${clauses[0] ?? 'something else'}?`;
  }
  if (clauses.length === 2) {
    return `I want to make sure I help you correctly. Are you asking about ${clauses[0]} or ${clauses[1]}?`;
  }
  const head = clauses.slice(0, -1).join(', ');
  return `I want to make sure I help you correctly. Are you asking about ${head}, or ${clauses[clauses.length - 1]}?`;
}
