export const datasetArgs = {
  values: {
    type: 'string',
    short: 'v',
    description: 'Comma-separated numbers (use --values=-1,2 when the first is negative)',
  },
} as const;
