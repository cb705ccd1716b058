/**
 * Arguments shared by the loan commands.
 * Rates here are annual percentages (5 = 5%), unlike the other groups.
 */
export const loanArgs = {
  principal: { type: 'string', short: 'p', description: 'Loan amount' },
  rate: { type: 'string', short: 'r', description: 'Annual interest rate as a percentage (5 = 5%)' },
  years: { type: 'string', short: 't', description: 'Loan term in years' },
} as const;
