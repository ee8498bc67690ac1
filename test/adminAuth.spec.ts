import { getAdminToken, tokensMatch } from '../src/middlewares/adminAuth';

describe('admin token', () => {
  test('tokensMatch compares whole tokens', () => {
    expect(tokensMatch('test-secret', 'test-secret')).toBe(true);
    expect(tokensMatch('test-secreT', 'test-secret')).toBe(false);
    expect(tokensMatch('test', 'test-secret')).toBe(false);
  });

  test('the admin token is stable for the process', () => {
    const token = getAdminToken();
    expect(token.length).toBeGreaterThanOrEqual(8);
    expect(getAdminToken()).toBe(token);
  });
});
