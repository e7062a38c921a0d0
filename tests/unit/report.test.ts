/**
 * Unit Tests: Plan and Result Summaries
 */

import { describe, it, expect } from 'vitest';
import {
  failedServices,
  formatPreview,
  formatReconciliationResult,
  isSuccessful,
} from '../../src/reconcilers/pro/report.js';
import type { ReconciliationPreview, ReconciliationResult } from '../../src/reconcilers/pro/types.js';

const RULE = '='.repeat(50);

describe('formatPreview', () => {
  it('summarizes a converged machine', () => {
    const preview: ReconciliationPreview = {
      observed: { attached: true, services: { 'esm-infra': 'enabled' } },
      plan: { attachment: null, services: [], settled: { 'esm-infra': { status: 'already-in-desired-state' } }, deferred: [] },
      changed: false,
    };

    expect(formatPreview(preview).split('\n')).toEqual([
      'Ubuntu Pro Reconciliation Plan',
      RULE,
      '',
      'Status: NO CHANGES',
      'Services checked: 1',
    ]);
  });

  it('lists planned actions and services that cannot be applied', () => {
    const preview: ReconciliationPreview = {
      observed: { attached: true, services: {} },
      plan: {
        attachment: null,
        services: [
          { kind: 'enable', service: 'esm-apps' },
          { kind: 'disable', service: 'livepatch' },
        ],
        settled: { 'cc-eal': { status: 'failed', reason: 'not entitled' } },
        deferred: [],
      },
      changed: true,
    };

    expect(formatPreview(preview).split('\n')).toEqual([
      'Ubuntu Pro Reconciliation Plan',
      RULE,
      '',
      'Status: CHANGES NEEDED',
      '',
      'Service actions:',
      '  + esm-apps',
      '  - livepatch',
      '',
      'Cannot be applied:',
      '  ! cc-eal: FAILED: not entitled',
    ]);
  });

  it('shows services deferred until after attach', () => {
    const preview: ReconciliationPreview = {
      observed: { attached: false, services: {} },
      plan: { attachment: 'attach', services: [], settled: {}, deferred: ['esm-infra', 'esm-apps'] },
      changed: true,
    };

    expect(formatPreview(preview).split('\n').slice(3)).toEqual([
      'Status: CHANGES NEEDED',
      '',
      'Attachment: attach',
      'Planned after attach: esm-infra, esm-apps',
    ]);
  });
});

describe('formatReconciliationResult', () => {
  it('summarizes a partially applied run', () => {
    const result: ReconciliationResult = {
      changed: true,
      finalAttached: true,
      serviceOutcomes: {
        'esm-infra': { status: 'already-in-desired-state' },
        'esm-apps': { status: 'changed', action: 'enable' },
        fips: { status: 'failed', reason: 'timeout' },
      },
      actions: [],
    };

    expect(formatReconciliationResult(result).split('\n')).toEqual([
      'Ubuntu Pro Reconciliation Result',
      RULE,
      '',
      'Status: PARTIALLY APPLIED',
      'Attached: yes',
      '',
      'Services:',
      '  = esm-infra: already in desired state',
      '  ~ esm-apps: enabled',
      '  ! fips: FAILED: timeout',
    ]);
  });

  it('shows the fatal error and an unknown attachment', () => {
    const result: ReconciliationResult = {
      changed: true,
      finalAttached: null,
      serviceOutcomes: {},
      error: {
        code: 'OBSERVATION_FAILED',
        message: 'Failed to read Ubuntu Pro status: timeout',
        reason: 'timeout',
      },
      actions: [],
    };

    expect(formatReconciliationResult(result).split('\n').slice(3)).toEqual([
      'Status: FAILED (OBSERVATION_FAILED)',
      'Error: Failed to read Ubuntu Pro status: timeout',
      'Attached: unknown',
    ]);
  });

  it('distinguishes changed from unchanged runs', () => {
    const base: ReconciliationResult = { changed: false, finalAttached: false, serviceOutcomes: {}, actions: [] };

    expect(formatReconciliationResult(base).split('\n').slice(3)).toEqual(['Status: NO CHANGES', 'Attached: no']);
    expect(formatReconciliationResult({ ...base, changed: true }).split('\n')[3]).toBe('Status: CHANGED');
  });
});

describe('isSuccessful', () => {
  it('requires no error and no failed service', () => {
    const ok: ReconciliationResult = {
      changed: false,
      finalAttached: true,
      serviceOutcomes: { a: { status: 'already-in-desired-state' } },
      actions: [],
    };
    const failed: ReconciliationResult = { ...ok, serviceOutcomes: { a: { status: 'failed', reason: 'x' } } };

    expect(isSuccessful(ok)).toBe(true);
    expect(isSuccessful(failed)).toBe(false);
    expect(failedServices(failed)).toEqual(['a']);
  });
});
