export const ReasonCodes = {
  // Generation
  templateMismatch: 'reconcile.template.mismatch',
  renderFailed: 'reconcile.render.failed',
  renderPlaceholder: 'reconcile.render.placeholder',

  // Existing libraries
  parseUnclosed: 'library.parse.unclosed',
  parseDuplicate: 'library.parse.duplicate',

  // Commit
  omittedUnselected: 'reconcile.commit.omitted_unselected',
} as const
