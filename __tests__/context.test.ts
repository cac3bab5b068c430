import { clearContextForTesting, getContext } from '@/context';
import { stubEnvironment } from '@/tests/helpers/environment';
import { endGroup, info, startGroup } from '@actions/core';
import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

describe('context', () => {
  beforeAll(() => {
    // We globally mock context to facilitate majority of testing; however,
    // this test case needs to explicitly test core functionality so we reset the
    // mock implementation for this test.
    vi.unmock('@/context');
  });

  beforeEach(() => {
    clearContextForTesting();
  });

  it('should read a pull request event', () => {
    stubEnvironment({ GITHUB_EVENT_NAME: 'pull_request', GITHUB_BASE_REF: 'main', GITHUB_ACTOR: 'octocat' });

    expect(getContext()).toEqual({
      eventName: 'pull_request',
      baseRef: 'main',
      actor: 'octocat',
      isPullRequest: true,
    });
  });

  it('should treat pull_request_target as a pull request event', () => {
    stubEnvironment({ GITHUB_EVENT_NAME: 'pull_request_target' });

    expect(getContext().isPullRequest).toBe(true);
  });

  it('should not treat a push as a pull request event', () => {
    stubEnvironment({ GITHUB_EVENT_NAME: 'push', GITHUB_BASE_REF: '' });

    expect(getContext().isPullRequest).toBe(false);
  });

  it('should default every field outside of GitHub Actions', () => {
    expect(getContext()).toEqual({
      eventName: '',
      baseRef: '',
      actor: '',
      isPullRequest: false,
    });
  });

  it('should trim surrounding whitespace', () => {
    stubEnvironment({ GITHUB_ACTOR: '  release-please[bot] \n' });

    expect(getContext().actor).toBe('release-please[bot]');
  });

  it('should return a frozen, cached instance', () => {
    const first = getContext();

    expect(Object.isFrozen(first)).toBe(true);
    expect(getContext()).toBe(first);
  });

  it('should log the context inside a group', () => {
    stubEnvironment({ GITHUB_EVENT_NAME: 'pull_request', GITHUB_BASE_REF: 'develop' });

    getContext();

    expect(startGroup).toHaveBeenCalledWith('Initializing Context');
    expect(vi.mocked(info).mock.calls).toEqual([
      ['Event Name: pull_request'],
      ['Base Ref: develop'],
      ['Actor: (none)'],
      ['Is Pull Request: true'],
    ]);
    expect(endGroup).toHaveBeenCalledOnce();
  });
});
