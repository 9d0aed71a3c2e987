import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { isDeprecatedPackage } from '../../../src/core/rewrite/package-eligibility.js';
import { transformPackageName } from '../../../src/core/rewrite/package-name-transformer.js';

describe('isDeprecatedPackage', () => {
  it('accepts packages from the deprecated organisations', () => {
    assert.equal(isDeprecatedPackage('zendframework/zend-mvc'), true);
    assert.equal(isDeprecatedPackage('zendframework/zendframework'), true);
    assert.equal(isDeprecatedPackage('zfcampus/zf-apigility'), true);
  });

  it('accepts packages that were never migrated, which the transformer keeps as they are', () => {
    for (const name of ['zendframework/zend-debug', 'zendframework/zendservice-apple-apns', 'zfcampus/zf-console']) {
      assert.equal(isDeprecatedPackage(name), true);
      assert.equal(transformPackageName(name), name);
    }
  });

  it('rejects replacement namespaces', () => {
    assert.equal(isDeprecatedPackage('laminas/laminas-mvc'), false);
    assert.equal(isDeprecatedPackage('laminas-api-tools/api-tools'), false);
    assert.equal(isDeprecatedPackage('mezzio/mezzio'), false);
  });

  it('matches case-sensitively at the start of the name only', () => {
    assert.equal(isDeprecatedPackage('ZendFramework/zend-mvc'), false);
    assert.equal(isDeprecatedPackage('acme/zendframework-bridge'), false);
    assert.equal(isDeprecatedPackage('my-zendframework/zend-mvc'), false);
    assert.equal(isDeprecatedPackage('zendframework'), false);
    assert.equal(isDeprecatedPackage('zendframework/'), false);
  });

  it('rejects unrelated names, which the transformer also leaves unchanged', () => {
    for (const name of ['symfony/console', 'laminas/laminas-db', 'psr/container']) {
      assert.equal(isDeprecatedPackage(name), false);
      assert.equal(transformPackageName(name), name);
    }
  });
});
