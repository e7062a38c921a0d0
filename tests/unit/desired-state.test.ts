/**
 * Unit Tests: Desired State Validation
 */

import { describe, it, expect } from 'vitest';
import {
  createDesiredState,
  effectiveAttachment,
  requestedServices,
} from '../../src/reconcilers/pro/desired.js';
import { InvalidDesiredStateError } from '../../src/reconcilers/pro/errors.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidDesiredStateError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('createDesiredState', () => {
  it('trims and deduplicates service names', () => {
    const desired = createDesiredState({ enable: [' esm-apps', 'esm-apps ', 'esm-infra'] });

    expect([...desired.servicesToEnable]).toEqual(['esm-apps', 'esm-infra']);
    expect(desired.servicesToDisable.size).toBe(0);
  });

  it('rejects empty service names', () => {
    expect(issuesOf(() => createDesiredState({ enable: ['  '], disable: [''] }))).toEqual([
      'enable list contains an empty service name',
      'disable list contains an empty service name',
    ]);
  });

  it('rejects a service in both lists', () => {
    expect(issuesOf(() => createDesiredState({ enable: ['esm-apps', 'fips'], disable: [' fips', 'livepatch'] }))).toEqual([
      'services listed as both enabled and disabled: fips',
    ]);
  });

  it('rejects services together with state=detached', () => {
    expect(issuesOf(() => createDesiredState({ attachment: 'detached', disable: ['livepatch'] }))).toEqual([
      'enabled/disabled services cannot be used with state=detached',
    ]);
  });

  it('builds the error message from every issue', () => {
    expect(() => createDesiredState({ attachment: 'detached', enable: ['a'], disable: ['a'] })).toThrow(
      'Invalid desired state: services listed as both enabled and disabled: a; ' +
        'enabled/disabled services cannot be used with state=detached'
    );
  });

  it('trims the token and drops a blank one', () => {
    expect(createDesiredState({ token: '  test-token\n' }).token).toBe('test-token');
    expect(createDesiredState({ token: '  ' }).token).toBeUndefined();
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(createDesiredState({ attachment: 'attached' }))).toBe(true);
  });
});

describe('requestedServices', () => {
  it('lists the enable list before the disable list', () => {
    const desired = createDesiredState({ enable: ['b', 'a'], disable: ['c'] });
    expect(requestedServices(desired)).toEqual(['b', 'a', 'c']);
  });
});

describe('effectiveAttachment', () => {
  it('uses the explicit attachment', () => {
    expect(effectiveAttachment(createDesiredState({ attachment: 'detached' }))).toBe('detached');
  });

  it('implies attached when services are listed', () => {
    expect(effectiveAttachment(createDesiredState({ enable: ['esm-apps'] }))).toBe('attached');
  });

  it('is undefined when nothing is requested', () => {
    expect(effectiveAttachment(createDesiredState({}))).toBeUndefined();
  });
});
