import type { StructuredAnalysis } from '../types'

// ============================================================================
// Sample Contract Text
// ============================================================================

export const SAMPLE_CONTRACT_TEXT =
  'MASTER SERVICES AGREEMENT\n\n' +
  'This Master Services Agreement is entered into as of March 1, 2024 between ' +
  'Acme Corp ("Service Provider") and Globex LLC ("Client").\n\n' +
  '1. Payment Terms. Client shall pay each invoice within fifteen (15) days of receipt. ' +
  'Late payments accrue interest at 1.5% per month.\n\n' +
  '2. Governing Law. This Agreement is governed by the laws of the State of Delaware.'

// ============================================================================
// Sample Analyses
// ============================================================================

export const SAMPLE_ANALYSIS: StructuredAnalysis = {
  title: 'Master Services Agreement',
  governingLaw: 'State of Delaware',
  parties: [
    { name: 'Acme Corp', role: 'Service Provider' },
    { name: 'Globex LLC', role: 'Client' },
  ],
  dates: [{ value: '2024-03-01', type: 'effective' }],
  clauses: [
    {
      name: 'Payment Terms',
      summary: 'Client pays each invoice within 15 days; late payments accrue interest.',
      risk: { level: 'High', reason: 'Short payment window with compounding late interest' },
      obligation: 'Pay within 15 days',
      liability: 'Interest of 1.5% per month on late payments',
      aiSummary: 'Invoices are due fast and lateness is expensive.',
      defaulted: [],
    },
  ],
}

export const SAMPLE_REVISED_ANALYSIS: StructuredAnalysis = {
  title: 'Master Services Agreement (Amended)',
  governingLaw: 'State of New York',
  parties: [{ name: 'Acme Corp', role: 'Vendor' }],
  dates: [],
  clauses: [
    {
      name: 'Limitation of Liability',
      summary: 'Each party caps liability at fees paid in the prior 12 months.',
      risk: { level: 'Low', reason: 'Mutual and market-standard' },
      obligation: 'Not specified',
      liability: 'Capped at 12 months of fees',
      aiSummary: 'Both sides limit what they can owe.',
      defaulted: ['obligation'],
    },
    {
      name: 'Termination',
      summary: 'Either party may terminate on 30 days notice.',
      risk: { level: 'Medium', reason: 'Short notice period' },
      obligation: 'Give 30 days written notice',
      liability: 'Fees for work performed to termination',
      aiSummary: 'Easy exit for both sides.',
      defaulted: [],
    },
  ],
}

/** The sample analysis as a model would return it */
export const SAMPLE_COMPLETION = JSON.stringify({
  title: SAMPLE_ANALYSIS.title,
  governingLaw: SAMPLE_ANALYSIS.governingLaw,
  parties: SAMPLE_ANALYSIS.parties,
  dates: SAMPLE_ANALYSIS.dates,
  clauses: SAMPLE_ANALYSIS.clauses.map(({ defaulted: _defaulted, ...clause }) => clause),
})
