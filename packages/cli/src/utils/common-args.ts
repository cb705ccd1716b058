/**
 * Flags shared by every calculation command
 */
export const outputArgs = {
  format: {
    type: 'string',
    description: 'Output format (table|json), default from FINCALC_DEFAULT_FORMAT',
  },
  debug: {
    type: 'boolean',
    description: 'Enable debug output',
  },
} as const;
