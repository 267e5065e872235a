import { CandidateScorer } from './candidate-scorer';
import { SignalExtractor } from './signal-extractor';
import type { Contact, EmailCandidate } from './interfaces/discovery.types';

const amy: Contact = {
  fullName: 'Amy Salazar',
  firstName: 'Amy',
  lastName: 'Salazar',
  title: 'Technical Recruiter',
  organizationKey: 'stripe.com',
  source: 'search_result',
};

const generated = (address: string, patternIndex: number, contact?: Contact): EmailCandidate => ({
  address,
  origin: 'generated',
  pattern: 'test',
  patternIndex,
  contact,
  personal: true,
  functional: false,
});

const observed = (address: string, overrides: Partial<EmailCandidate> = {}): EmailCandidate => ({
  address,
  origin: 'observed',
  pattern: 'observed',
  personal: true,
  functional: false,
  ...overrides,
});

describe('CandidateScorer', () => {
  const extractor = new SignalExtractor();
  const scorer = new CandidateScorer({
    roleRelevance: (text) => extractor.roleRelevance(text),
  });

  it('should score generated addresses by pattern rank and contact role', () => {
    const [scored] = scorer.score([generated('amy.salazar@stripe.com', 0, amy)]);

    // conventionality 5 * 1 + role 3 * 1
    expect(scored.score).toBe(8);
    expect(scored.confidence).toBe(0.444);
  });

  it('should rank an observed personal address above generated guesses', () => {
    const ranked = scorer.score([
      generated('asalazar@stripe.com', 1, amy),
      observed('amy.salazar@stripe.com'),
    ]);

    expect(ranked.map((c) => [c.address, c.score])).toEqual([
      ['amy.salazar@stripe.com', 15],
      ['asalazar@stripe.com', 7.5],
    ]);
  });

  it('should penalise functional mailboxes', () => {
    const [scored] = scorer.score([
      observed('jobs@stripe.com', { personal: false, functional: true }),
    ]);

    expect(scored.score).toBe(6);
    expect(scored.confidence).toBe(0.333);
  });

  it('should merge duplicate addresses and keep the linked contact', () => {
    const ranked = scorer.score([
      generated('amy.salazar@stripe.com', 0, amy),
      observed('amy.salazar@stripe.com'),
    ]);

    expect(ranked).toHaveLength(1);
    expect(ranked[0].origin).toBe('observed');
    expect(ranked[0].contact).toEqual(amy);
    // 10 observed + 5 conventionality + 3 role once the contact is linked
    expect(ranked[0].score).toBe(18);
  });

  it('should drop addresses verified invalid and put verified ones first', () => {
    const ranked = scorer.score([
      observed('amy.salazar@stripe.com', { verification: 'invalid' }),
      observed('bob.jones@stripe.com'),
      { ...generated('asalazar@stripe.com', 1, amy), verification: 'valid' },
    ]);

    expect(ranked.map((c) => c.address)).toEqual(['asalazar@stripe.com', 'bob.jones@stripe.com']);
    expect(ranked[0].confidence).toBe(1);
  });

  it('should break score ties by address', () => {
    const ranked = scorer.score([
      generated('bob.smith@example.com', 0),
      generated('amy.jones@example.com', 0),
    ]);

    expect(ranked.map((c) => c.address)).toEqual([
      'amy.jones@example.com',
      'bob.smith@example.com',
    ]);
  });

  it('should be idempotent on its own output', () => {
    const once = scorer.score([
      generated('bob.smith@example.com', 3),
      observed('info@example.com', { personal: false, functional: true }),
      generated('amy.jones@example.com', 0, amy),
      observed('amy.jones@example.com'),
    ]);
    const twice = scorer.score(once);

    expect(twice).toEqual(once);
  });

  it('should not read recruiting keywords inside names', () => {
    const ranked = scorer.score([observed('shreya.rao@acme.com'), observed('anna.rao@acme.com')]);

    expect(ranked.map((c) => [c.address, c.score])).toEqual([
      ['anna.rao@acme.com', 15],
      ['shreya.rao@acme.com', 15],
    ]);
  });

  it('should credit recruiting words next to an observed address', () => {
    const ranked = scorer.score([
      observed('john.roe@acme.com', { context: 'Press inquiries: john.roe@acme.com' }),
      observed('jane.doe@acme.com', { context: 'Talent Acquisition jane.doe@acme.com' }),
    ]);

    // 10 observed + 5 conventionality -/+ 3 context
    expect(ranked.map((c) => [c.address, c.score])).toEqual([
      ['jane.doe@acme.com', 18],
      ['john.roe@acme.com', 12],
    ]);
  });

  it('should credit addresses found on careers pages', () => {
    const ranked = scorer.score([
      observed('amy.jones@acme.com', { sourceUrl: 'https://acme.com/about' }),
      observed('bob.smith@acme.com', { sourceUrl: 'https://acme.com/careers/open-roles' }),
    ]);

    expect(ranked.map((c) => [c.address, c.score, c.confidence])).toEqual([
      ['bob.smith@acme.com', 17, 0.944],
      ['amy.jones@acme.com', 15, 0.833],
    ]);
  });

  it('should ignore context weights for generated addresses', () => {
    const [scored] = scorer.score([
      {
        ...generated('amy.salazar@stripe.com', 0, amy),
        context: 'press',
        sourceUrl: 'https://stripe.com/jobs',
      },
    ]);

    expect(scored.score).toBe(8);
  });

  it('should clamp confidence at zero', () => {
    const harsh = new CandidateScorer({
      weights: { observed: 0, conventionality: 5, role: 3, functionalPenalty: 20 },
    });
    const [scored] = harsh.score([
      observed('info@example.com', { personal: false, functional: true }),
    ]);

    expect(scored.score).toBe(-20);
    expect(scored.confidence).toBe(0);
  });

  describe('select', () => {
    it('should return no best candidate for an empty list', () => {
      expect(scorer.select([])).toEqual({ best: null, backups: [] });
    });

    it('should keep backups within 80% of the best score', () => {
      const { best, backups } = scorer.select([
        observed('amy.salazar@stripe.com'),
        observed('bob.jones@stripe.com'),
        generated('asalazar@stripe.com', 1, amy),
        observed('jobs@stripe.com', { personal: false, functional: true }),
      ]);

      expect(best?.address).toBe('amy.salazar@stripe.com');
      expect(backups.map((c) => c.address)).toEqual(['bob.jones@stripe.com']);
    });

    it('should cap the number of backups', () => {
      const { backups } = scorer.select(
        ['a.one', 'b.two', 'c.three', 'd.four', 'e.five'].map((local) =>
          observed(`${local}@example.com`),
        ),
      );

      expect(backups.map((c) => c.address)).toEqual([
        'b.two@example.com',
        'c.three@example.com',
        'd.four@example.com',
      ]);
    });
  });
});
