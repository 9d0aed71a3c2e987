import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { transformPackageName } from '../../../src/core/rewrite/package-name-transformer.js';

describe('transformPackageName', () => {
  it('maps zend- components into the laminas vendor', () => {
    assert.equal(transformPackageName('zendframework/zend-mvc'), 'laminas/laminas-mvc');
    assert.equal(transformPackageName('zendframework/zend-servicemanager'), 'laminas/laminas-servicemanager');
  });

  it('maps non zend- packages of the organisation into the laminas vendor', () => {
    assert.equal(transformPackageName('zendframework/zendframework'), 'laminas/laminas-zendframework');
    assert.equal(transformPackageName('zendframework/zenddiagnostics'), 'laminas/laminas-zenddiagnostics');
  });

  it('maps expressive packages into mezzio', () => {
    assert.equal(transformPackageName('zendframework/zend-expressive'), 'mezzio/mezzio');
    assert.equal(transformPackageName('zendframework/zend-expressive-helpers'), 'mezzio/mezzio-helpers');
    assert.equal(transformPackageName('zendframework/zend-problem-details'), 'mezzio/mezzio-problem-details');
  });

  it('applies exact renames before prefix rules', () => {
    assert.equal(transformPackageName('zendframework/zend-expressive-zendrouter'), 'mezzio/mezzio-laminasrouter');
    assert.equal(
      transformPackageName('zendframework/zend-expressive-zendviewrenderer'),
      'mezzio/mezzio-laminasviewrenderer'
    );
    assert.equal(
      transformPackageName('zendframework/zend-expressive-authentication-zendauthentication'),
      'mezzio/mezzio-authentication-laminasauthentication'
    );
  });

  it('maps zfcampus packages', () => {
    assert.equal(transformPackageName('zfcampus/zf-apigility'), 'laminas-api-tools/api-tools');
    assert.equal(transformPackageName('zfcampus/zf-apigility-doctrine'), 'laminas-api-tools/api-tools-doctrine');
    assert.equal(transformPackageName('zfcampus/zf-content-negotiation'), 'laminas-api-tools/api-tools-content-negotiation');
    assert.equal(transformPackageName('zfcampus/zf-development-mode'), 'laminas/laminas-development-mode');
    assert.equal(transformPackageName('zfcampus/zf-composer-autoloading'), 'laminas/laminas-composer-autoloading');
    assert.equal(transformPackageName('zfcampus/zf-deploy'), 'laminas/laminas-deploy');
  });

  it('keeps packages that never got a successor', () => {
    for (const name of [
      'zendframework/zend-debug',
      'zendframework/zend-version',
      'zendframework/zendservice-apple-apns',
      'zendframework/zendservice-google-gcm',
      'zfcampus/zf-apigility-example',
      'zfcampus/zf-angular',
      'zfcampus/zf-console'
    ]) {
      assert.equal(transformPackageName(name), name);
    }
  });

  it('returns unrelated names unchanged', () => {
    for (const name of ['symfony/console', 'laminas/laminas-mvc', 'mezzio/mezzio', 'acme/zendframework', 'Zendframework/zend-mvc']) {
      assert.equal(transformPackageName(name), name);
    }
  });

  it('is idempotent', () => {
    for (const name of [
      'zendframework/zend-db',
      'zendframework/zend-expressive-fastroute',
      'zendframework/zend-expressive-zendrouter',
      'zfcampus/zf-apigility-admin',
      'zfcampus/zf-development-mode'
    ]) {
      const once = transformPackageName(name);
      assert.notEqual(once, name);
      assert.equal(transformPackageName(once), once);
    }
  });
});
