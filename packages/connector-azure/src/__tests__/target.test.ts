import { describe, it, expect } from 'vitest';
import { parseTarget } from '../target.js';

describe('parseTarget()', () => {
  it.each([
    [undefined, { groups: '', hosts: '' }],
    ['', { groups: '', hosts: '' }],
    ['dev,prod/', { groups: 'dev,prod', hosts: '' }],
    ['db,webserver', { groups: '', hosts: 'db,webserver' }],
    ['/db,webserver', { groups: '', hosts: 'db,webserver' }],
    ['dev,prod/webserver', { groups: 'dev,prod', hosts: 'webserver' }],
    ['dev/web/extra', { groups: 'dev', hosts: 'web/extra' }],
  ])('parses %j', (pattern, expected) => {
    expect(parseTarget(pattern)).toEqual(expected);
  });
});
