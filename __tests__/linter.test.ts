import { lintCommits, lintSubject } from '@/linter';
import { defaultConfig } from '@/mocks/config';
import type { LintRules } from '@/types';
import { VIOLATION } from '@/utils/constants';
import { debug } from '@actions/core';
import { describe, expect, it } from 'vitest';

const rules = (overrides: Partial<LintRules> = {}): LintRules => ({ ...defaultConfig, ...overrides });

describe('linter', () => {
  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
  // lintSubject()
  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

  describe('lintSubject()', () => {
    describe('compliant subjects', () => {
      const validSubjects = [
        'feat: add login form',
        'fix(api): handle empty body',
        'refactor(core)!: drop legacy exports',
        'revert: undo login form',
        'docs(readme): mention v2.0 changes',
      ];

      for (const subject of validSubjects) {
        it(`should accept "${subject}"`, () => {
          expect(lintSubject(subject, rules())).toEqual([]);
        });
      }
    });

    describe('merge subjects', () => {
      const strictRules = rules({ allowedTypes: ['feat'], requireScope: true, maxSubjectLength: 5 });
      const mergeSubjects = [
        'Merge pull request #7 from octo-org/Feature.Branch',
        "Merge branch 'develop'",
        "Merge branch 'develop' into main",
        'Merge 1a2b3c4 into 5d6e7f8',
      ];

      for (const subject of mergeSubjects) {
        it(`should accept "${subject}" regardless of configuration`, () => {
          expect(lintSubject(subject, strictRules)).toEqual([]);
        });
      }
    });

    describe('format', () => {
      it('should report only the format violation when the grammar does not match', () => {
        expect(lintSubject('missing colon', rules())).toEqual([VIOLATION.FORMAT]);
      });

      it('should not evaluate other rules after a format violation', () => {
        const result = lintSubject('Update the readme.', rules({ requireScope: true, maxSubjectLength: 1 }));
        expect(result).toEqual([
          "format must be 'type(scope)?: subject' with lowercase type and a space after colon",
        ]);
      });

      it('should reject an uppercase type', () => {
        expect(lintSubject('Fix: handle empty body', rules())).toEqual([VIOLATION.FORMAT]);
      });
    });

    describe('type allow-list', () => {
      it('should reject a type outside the allow-list', () => {
        expect(lintSubject('unknown: some message', rules({ allowedTypes: ['feat', 'fix'] }))).toEqual([
          "type 'unknown' is not allowed. Allowed: feat, fix",
        ]);
      });

      it('should accept any type when the allow-list is absent', () => {
        expect(lintSubject('wip: some message', rules({ allowedTypes: null }))).toEqual([]);
      });

      it('should reject every type when the allow-list is explicitly empty', () => {
        expect(lintSubject('feat: some message', rules({ allowedTypes: [] }))).toEqual([
          "type 'feat' is not allowed. Allowed: ",
        ]);
      });
    });

    describe('required scope', () => {
      it('should report a missing scope', () => {
        expect(
          lintSubject('feat: missing scope', rules({ requireScope: true, requireScopeExceptTypes: [] })),
        ).toEqual(['scope is required but missing']);
      });

      it('should exempt the configured types', () => {
        expect(lintSubject('revert: undo login form', rules({ requireScope: true }))).toEqual([]);
      });

      it('should accept a subject that has a scope', () => {
        expect(lintSubject('feat(ui): add button', rules({ requireScope: true }))).toEqual([]);
      });
    });

    describe('scope allow-list', () => {
      const scopedRules = rules({ allowedScopes: ['api', 'ui'] });

      it('should reject a scope outside the allow-list', () => {
        expect(lintSubject('feat(db): add index', scopedRules)).toEqual([
          "scope 'db' is not in allowed list: api, ui",
        ]);
      });

      it('should accept a scope in the allow-list', () => {
        expect(lintSubject('feat(ui): add button', scopedRules)).toEqual([]);
      });

      it('should not require a scope because an allow-list exists', () => {
        expect(lintSubject('feat: add button', scopedRules)).toEqual([]);
      });
    });

    describe('description', () => {
      it('should report an empty description', () => {
        expect(lintSubject('chore: ', rules())).toEqual(['subject must not be empty']);
      });

      it('should treat a whitespace-only description as empty', () => {
        expect(lintSubject('chore:    ', rules())).toEqual(['subject must not be empty']);
      });

      it('should measure the untrimmed description for length', () => {
        expect(lintSubject('chore:    ', rules({ maxSubjectLength: 2 }))).toEqual([
          'subject must not be empty',
          'subject too long (3 > 2)',
        ]);
      });

      it('should report a description longer than the maximum', () => {
        const subject = 'fix: this subject is definitely way too long for the linter to accept';
        expect(lintSubject(subject, rules({ maxSubjectLength: 20 }))).toEqual(['subject too long (64 > 20)']);
      });

      it('should measure the description length in UTF-8 bytes', () => {
        // 'añadir' is 6 characters but 7 bytes
        expect(lintSubject(`feat: ${'añadir'.repeat(12)}`, rules())).toEqual(['subject too long (84 > 72)']);
      });

      it('should count a four-byte character as four', () => {
        expect(lintSubject('feat: 😀', rules({ maxSubjectLength: 1 }))).toEqual(['subject too long (4 > 1)']);
      });

      it('should accept a description exactly at the maximum', () => {
        expect(lintSubject('fix: twelve chars', rules({ maxSubjectLength: 12 }))).toEqual([]);
      });

      it('should report a trailing period', () => {
        expect(lintSubject('docs: add some documentation.', rules())).toEqual(['subject must not end with a period']);
      });

      it('should check the trailing period on the untrimmed description', () => {
        expect(lintSubject('docs: add some documentation. ', rules())).toEqual([]);
      });

      it('should report a leading capital letter', () => {
        expect(lintSubject('style: Format the code', rules())).toEqual([
          'subject should start lowercase (imperative mood)',
        ]);
      });

      it('should allow a leading capital letter when configured', () => {
        expect(lintSubject('style: Format the code', rules({ allowCapitalSubject: true }))).toEqual([]);
      });

      it('should check casing on the untrimmed description', () => {
        expect(lintSubject('style:  Format the code', rules())).toEqual([]);
      });

      it('should lint a description containing a carriage return or line separator', () => {
        expect(lintSubject('feat: add\rthing', rules())).toEqual([]);
        expect(lintSubject('feat: add\u2028thing', rules())).toEqual([]);
      });

      it('should only treat ASCII capitals as uppercase', () => {
        expect(lintSubject('docs: Ärger with umlauts', rules())).toEqual([]);
      });
    });

    it('should report every failing rule in order', () => {
      const result = lintSubject(
        'wip(core): Add stuff.',
        rules({ allowedTypes: ['feat'], allowedScopes: ['api'], maxSubjectLength: 5 }),
      );

      expect(result).toEqual([
        "type 'wip' is not allowed. Allowed: feat",
        "scope 'core' is not in allowed list: api",
        'subject too long (10 > 5)',
        'subject must not end with a period',
        'subject should start lowercase (imperative mood)',
      ]);
    });

    it('should return identical results for repeated calls', () => {
      const config = rules({ allowedTypes: ['feat'] });
      const first = lintSubject('fix: Broken.', config);

      expect(lintSubject('fix: Broken.', config)).toEqual(first);
      expect(first).toEqual([
        "type 'fix' is not allowed. Allowed: feat",
        'subject must not end with a period',
        'subject should start lowercase (imperative mood)',
      ]);
    });
  });

  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
  // lintCommits()
  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

  describe('lintCommits()', () => {
    it('should aggregate violations per commit', () => {
      const commits = [
        { sha: 'aaaaaaaaaaaa', subject: 'feat: add login form' },
        { sha: 'bbbbbbbbbbbb', subject: 'Update readme' },
        { sha: 'cccccccccccc', subject: 'docs: Explain setup.' },
      ];

      expect(lintCommits(commits, rules())).toEqual({
        commitCount: 3,
        violationCount: 3,
        results: [
          { commit: commits[1], violations: [VIOLATION.FORMAT] },
          {
            commit: commits[2],
            violations: ['subject must not end with a period', 'subject should start lowercase (imperative mood)'],
          },
        ],
      });
      expect(debug).toHaveBeenCalledWith('aaaaaaaaaaaa: 0 violation(s)');
    });

    it('should return an empty report for no commits', () => {
      expect(lintCommits([], rules())).toEqual({ commitCount: 0, violationCount: 0, results: [] });
    });
  });
});
