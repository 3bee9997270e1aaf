export const VERDICTS = ['approved', 'reviewing', 'rejected'] as const;

export type Verdict = (typeof VERDICTS)[number];

export const VERDICT_TEXT: Record<Verdict, string> = {
  approved: 'The work has been reviewed: the reviewer liked everything. Hooray!',
  reviewing: 'The work has been taken for review by a reviewer.',
  rejected: 'The work has been reviewed: the reviewer has comments.',
};

const VERDICT_SET = new Set<string>(VERDICTS);

export function isVerdict(code: string): code is Verdict {
  return VERDICT_SET.has(code);
}
