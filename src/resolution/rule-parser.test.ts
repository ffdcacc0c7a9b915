/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { parseRule } from './rule-parser.js';

describe('parseRule', () => {
  describe('catch-all rules', () => {
    it('should parse a temporary catch-all', () => {
      assert.deepEqual(parseRule('Redirects to https://example.com/'), {
        to: 'https://example.com/',
        status: 302,
      });
    });

    it('should parse a permanent catch-all', () => {
      assert.deepEqual(
        parseRule('Redirects permanently to https://example.com/'),
        { to: 'https://example.com/', status: 301 },
      );
    });

    it('should not set a source pattern', () => {
      const rule = parseRule('Redirects to https://example.com/');
      assert.equal(rule?.from, undefined);
      assert.equal(rule !== undefined && 'from' in rule, false);
    });
  });

  describe('scoped rules', () => {
    it('should parse a temporary scoped rule', () => {
      assert.deepEqual(
        parseRule('Redirects from /test/* to https://example.org/docs/*'),
        {
          from: '/test/*',
          to: 'https://example.org/docs/*',
          status: 302,
        },
      );
    });

    it('should parse a permanent scoped rule', () => {
      assert.deepEqual(
        parseRule(
          'Redirects permanently from /noglob/ to https://example.org/docs/noglob',
        ),
        {
          from: '/noglob/',
          to: 'https://example.org/docs/noglob',
          status: 301,
        },
      );
    });
  });

  describe('explicit status', () => {
    it('should override the default status', () => {
      assert.deepEqual(parseRule('Redirects to https://example.com/ with 308'), {
        to: 'https://example.com/',
        status: 308,
      });
    });

    it('should override a permanent status', () => {
      assert.deepEqual(
        parseRule(
          'Redirects permanently from /a/* to https://example.com/b/* with 307',
        ),
        { from: '/a/*', to: 'https://example.com/b/*', status: 307 },
      );
    });

    it('should reject codes that are not redirects', () => {
      assert.equal(parseRule('Redirects to https://example.com/ with 200'), undefined);
      assert.equal(parseRule('Redirects to https://example.com/ with 304'), undefined);
      assert.equal(parseRule('Redirects to https://example.com/ with 3080'), undefined);
    });

    it('should reject a dangling with clause', () => {
      assert.equal(parseRule('Redirects to https://example.com/ with'), undefined);
    });
  });

  describe('whitespace', () => {
    it('should tolerate surrounding and repeated whitespace', () => {
      assert.deepEqual(
        parseRule('  Redirects   from /a   to  https://example.com/a \t'),
        { from: '/a', to: 'https://example.com/a', status: 302 },
      );
    });
  });

  describe('rejected records', () => {
    it('should ignore unrelated TXT records', () => {
      assert.equal(parseRule('v=spf1 include:example.com ~all'), undefined);
      assert.equal(parseRule('v=DKIM1; k=rsa; p=MIGf'), undefined);
      assert.equal(parseRule('google-site-verification=abc123'), undefined);
      assert.equal(parseRule(''), undefined);
    });

    it('should require a target', () => {
      assert.equal(parseRule('Redirects to'), undefined);
      assert.equal(parseRule('Redirects from /a to'), undefined);
      assert.equal(parseRule('Redirects from /a'), undefined);
    });

    it('should treat keywords as case-sensitive', () => {
      assert.equal(parseRule('redirects to https://example.com/'), undefined);
      assert.equal(
        parseRule('Redirects Permanently to https://example.com/'),
        undefined,
      );
      assert.equal(parseRule('Redirects TO https://example.com/'), undefined);
    });

    it('should reject unknown words between keywords', () => {
      assert.equal(
        parseRule('Redirects temporarily to https://example.com/'),
        undefined,
      );
      assert.equal(
        parseRule('Redirects from /a /b to https://example.com/'),
        undefined,
      );
    });
  });

  describe('wildcards', () => {
    it('should reject a wildcard that is not the last character', () => {
      assert.equal(
        parseRule('Redirects from /*/a to https://example.com/*'),
        undefined,
      );
      assert.equal(
        parseRule('Redirects from /a/* to https://example.com/*/b'),
        undefined,
      );
    });

    it('should reject more than one wildcard', () => {
      assert.equal(
        parseRule('Redirects from /a/** to https://example.com/*'),
        undefined,
      );
    });

    it('should require the target to re-append a captured suffix', () => {
      assert.equal(
        parseRule('Redirects from /a/* to https://example.com/'),
        undefined,
      );
    });

    it('should reject a target wildcard with nothing captured', () => {
      assert.equal(parseRule('Redirects to https://example.com/*'), undefined);
      assert.equal(
        parseRule('Redirects from /a to https://example.com/*'),
        undefined,
      );
    });
  });

  it('should be deterministic', () => {
    const record = 'Redirects permanently from /x/* to https://example.com/*';
    assert.deepEqual(parseRule(record), parseRule(record));
  });
});
