import { describe, it, expect } from 'vitest';
import { classifyByKeywords, FALLBACK_MODEL_VERSION } from '../fallbackClassifier';
import { DEPARTMENT_TEAMS } from '../departments';

describe('fallbackClassifier', () => {
  // ─── No matches ─────────────────────────────────────────────────────────────

  describe('no keyword matches', () => {
    it('returns GENERAL with confidence 0.3', () => {
      const result = classifyByKeywords('Question', 'Where do I find the handbook?');
      expect(result.department).toBe('GENERAL');
      expect(result.confidenceScore).toBe(0.3);
      expect(result.assignedTo).toBe('general_support');
    });

    it('reports zero matched keywords in the reasoning', () => {
      const result = classifyByKeywords('Hello', 'Just saying hi');
      expect(result.reasoning).toBe(
        'Fallback classification based on keyword analysis. Matched 0 keywords for GENERAL.'
      );
    });
  });

  // ─── Scoring ────────────────────────────────────────────────────────────────

  describe('scoring', () => {
    it('VPN ticket → IT, first IT team, confidence 0.5', () => {
      const result = classifyByKeywords('VPN not working', 'Cannot connect to VPN after update');
      expect(result.department).toBe('IT');
      expect(result.assignedTo).toBe(DEPARTMENT_TEAMS.IT[0]);
      expect(result.confidenceScore).toBe(0.5);
    });

    it('counts each keyword once no matter how often it appears', () => {
      const result = classifyByKeywords('vpn vpn vpn', 'vpn again');
      expect(result.confidenceScore).toBe(0.5);
    });

    it('two matches → 0.6', () => {
      const result = classifyByKeywords('Invoice question', 'The vendor sent it twice');
      expect(result.department).toBe('FINANCE');
      expect(result.confidenceScore).toBe(0.6);
      expect(result.assignedTo).toBe('finance_team');
    });

    it('caps confidence at 0.7', () => {
      const result = classifyByKeywords(
        'Phishing and malware',
        'Suspicious badge access, possible breach'
      );
      expect(result.department).toBe('SECURITY');
      expect(result.confidenceScore).toBe(0.7);
    });

    it('matching is case-insensitive', () => {
      const result = classifyByKeywords('GDPR', 'PRIVACY review needed');
      expect(result.department).toBe('LEGAL');
      expect(result.confidenceScore).toBe(0.6);
    });

    it('highest score wins over earlier departments', () => {
      // IT: vpn (1); FACILITIES: office, parking, heating (3)
      const result = classifyByKeywords('Office parking', 'Heating broken, vpn fine');
      expect(result.department).toBe('FACILITIES');
    });
  });

  // ─── Ties ───────────────────────────────────────────────────────────────────

  describe('tie-break', () => {
    it('IT beats HR on equal score', () => {
      const result = classifyByKeywords('Payroll', 'wifi');
      expect(result.department).toBe('IT');
    });

    it('FACILITIES beats SECURITY on equal score', () => {
      const result = classifyByKeywords('Parking', 'malware');
      expect(result.department).toBe('FACILITIES');
    });

    it('FINANCE beats LEGAL on equal score', () => {
      const result = classifyByKeywords('Budget', 'lawsuit');
      expect(result.department).toBe('FINANCE');
    });
  });

  // ─── Shape ──────────────────────────────────────────────────────────────────

  it('marks results with the fallback model version', () => {
    const result = classifyByKeywords('VPN', 'down');
    expect(result.modelVersion).toBe(FALLBACK_MODEL_VERSION);
    expect(result.processingTimeMs).toBe(0);
  });

  it('carries the supplied processing time', () => {
    const result = classifyByKeywords('VPN', 'down', 42);
    expect(result.processingTimeMs).toBe(42);
  });

  it('confidence always stays within [0.3, 0.7]', () => {
    const samples: Array<[string, string]> = [
      ['', ''],
      ['vpn', ''],
      ['vpn laptop password', 'email network wifi software login system computer'],
      ['contract', 'compliance gdpr privacy legal lawsuit regulation'],
    ];
    for (const [title, description] of samples) {
      const { confidenceScore } = classifyByKeywords(title, description);
      expect(confidenceScore).toBeGreaterThanOrEqual(0.3);
      expect(confidenceScore).toBeLessThanOrEqual(0.7);
    }
  });

  it('returns a frozen result', () => {
    const result = classifyByKeywords('VPN', 'down');
    expect(Object.isFrozen(result)).toBe(true);
  });
});
