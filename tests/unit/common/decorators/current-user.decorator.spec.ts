import { UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { resolveCurrentUser } from '@common/decorators/current-user.decorator';
import { USER_A } from '@test/support/fixtures';

describe('CurrentUser', () => {
  const contextWith = (headers: Record<string, string | string[]>) =>
    new ExecutionContextHost([{ headers }, {}]);

  it('should read the user id from the X-User-Id header', () => {
    expect(resolveCurrentUser(undefined, contextWith({ 'x-user-id': USER_A }))).toBe(USER_A);
  });

  it('should normalize the id to lower case', () => {
    expect(
      resolveCurrentUser(undefined, contextWith({ 'x-user-id': ` ${USER_A.toUpperCase()} ` })),
    ).toBe(USER_A);
  });

  it('should take the first value of a repeated header', () => {
    expect(resolveCurrentUser(undefined, contextWith({ 'x-user-id': [USER_A, 'other'] }))).toBe(
      USER_A,
    );
  });

  it('should reject a request without a user id', () => {
    expect(() => resolveCurrentUser(undefined, contextWith({}))).toThrow(UnauthorizedException);
  });

  it('should reject a user id that is not a UUID', () => {
    expect(() => resolveCurrentUser(undefined, contextWith({ 'x-user-id': 'alice' }))).toThrow(
      'X-User-Id header with a valid user UUID is required',
    );
  });
});
