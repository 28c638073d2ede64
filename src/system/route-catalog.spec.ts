import { joinPath, normalizePath } from './route-catalog';

describe('route paths', () => {
  it('trims surrounding slashes', () => {
    expect(normalizePath('/teachers/')).toBe('teachers');
    expect(normalizePath(undefined)).toBe('');
  });

  it('joins prefix, controller and handler paths', () => {
    expect(joinPath('api/v1', 'teachers', ':id/classes')).toBe('/api/v1/teachers/:id/classes');
    expect(joinPath('api/v1', '', '')).toBe('/api/v1');
    expect(joinPath('api/v1', 'dashboard', '/stats')).toBe('/api/v1/dashboard/stats');
  });
});
