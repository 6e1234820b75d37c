/**
 * Pattern Compiler Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigurationError, SwitchyardError } from '../../framework/errors.ts';
import {
  buildPath,
  compilePattern,
  convertParam,
  countSegments,
  joinPaths,
  normalizePath,
} from '../../framework/router/patterns.ts';

function configError(code: string) {
  return (error: unknown) => error instanceof ConfigurationError && error.code === code;
}

test('normalizePath - strips trailing slashes but keeps the root', () => {
  assert.equal(normalizePath('/a/b/'), '/a/b');
  assert.equal(normalizePath('/a/b//'), '/a/b');
  assert.equal(normalizePath('/'), '/');
  assert.equal(normalizePath(''), '/');
});

test('joinPaths - joins fragments with single slashes', () => {
  assert.equal(joinPaths('/api/', 'v1', '/users'), '/api/v1/users');
  assert.equal(joinPaths('', '/'), '/');
  assert.equal(joinPaths('/api', '', '/'), '/api');
});

test('countSegments - root counts as one', () => {
  assert.equal(countSegments('/'), 1);
  assert.equal(countSegments(''), 1);
});

test('countSegments - counts separators', () => {
  assert.equal(countSegments('/a'), 1);
  assert.equal(countSegments('/a/b'), 2);
  assert.equal(countSegments('/users/{id:int}/posts'), 3);
});

test('countSegments - a trailing slash opens an empty segment', () => {
  assert.equal(countSegments('/files/'), 2);
  assert.equal(countSegments('/a/b/'), 3);
});

test('compilePattern - segment count matches the normalized template', () => {
  assert.equal(compilePattern('/').segmentCount, 1);
  assert.equal(compilePattern('/a/b/').segmentCount, 2);
  assert.equal(compilePattern('/users/{id:int}/files/{rest:multipath}').segmentCount, 4);
});

test('compilePattern - literal template', () => {
  const pattern = compilePattern('/about/team');
  assert.equal(pattern.template, '/about/team');
  assert.deepEqual(pattern.params, []);
  assert.equal(pattern.hasTailParameter, false);
  assert.ok(pattern.regex.test('/about/team'));
  assert.ok(!pattern.regex.test('/about/teams'));
});

test('compilePattern - escapes regex characters in literals', () => {
  const pattern = compilePattern('/files/report.pdf');
  assert.ok(pattern.regex.test('/files/report.pdf'));
  assert.ok(!pattern.regex.test('/files/reportXpdf'));
});

test('compilePattern - parameter kinds', () => {
  const pattern = compilePattern('/{a}/{b:int}/{c:float}/{d:uuid}/{e:multipath}');
  assert.deepEqual(pattern.params, [
    { name: 'a', kind: 'str' },
    { name: 'b', kind: 'int' },
    { name: 'c', kind: 'float' },
    { name: 'd', kind: 'uuid' },
    { name: 'e', kind: 'multipath' },
  ]);
  assert.equal(pattern.hasTailParameter, true);
});

test('compilePattern - str does not cross segments', () => {
  const pattern = compilePattern('/users/{name}');
  assert.ok(pattern.regex.test('/users/alice'));
  assert.ok(!pattern.regex.test('/users/alice/extra'));
});

test('compilePattern - multipath may be empty and contain slashes', () => {
  const { regex } = compilePattern('/files/{p:multipath}');
  assert.equal(regex.exec('/files/a/b/c')?.[1], 'a/b/c');
  assert.equal(regex.exec('/files/')?.[1], '');
});

test('compilePattern - unsupported kind', () => {
  assert.throws(() => compilePattern('/users/{id:number}'), {
    name: 'ConfigurationError',
    message: 'Unsupported parameter type: number',
  });
});

test('compilePattern - unclosed parameter reports its position', () => {
  assert.throws(() => compilePattern('/users/{id'), {
    name: 'ConfigurationError',
    message: 'Unclosed parameter at position 7',
  });
});

test('compilePattern - wildcards are rejected', () => {
  assert.throws(() => compilePattern('/files/*'), configError('WILDCARD'));
  assert.throws(() => compilePattern('/files/**'), /multipath/);
});

test('compilePattern - empty, invalid and duplicate names', () => {
  assert.throws(() => compilePattern('/users/{}'), configError('INVALID_PARAMETER'));
  assert.throws(() => compilePattern('/users/{:int}'), configError('INVALID_PARAMETER'));
  assert.throws(() => compilePattern('/users/{1st}'), configError('INVALID_PARAMETER'));
  assert.throws(() => compilePattern('/{id}/{id}'), configError('INVALID_PARAMETER'));
  assert.throws(() => compilePattern('/x/{__proto__}'), configError('INVALID_PARAMETER'));
});

test('convertParam - int', () => {
  assert.equal(convertParam('int', '123'), 123);
  assert.equal(convertParam('int', '99999999999999999999'), undefined);
});

test('convertParam - float', () => {
  assert.equal(convertParam('float', '2.5'), 2.5);
  assert.equal(convertParam('float', '3'), 3);
});

test('convertParam - strings are percent-decoded', () => {
  assert.equal(convertParam('str', 'my%20doc'), 'my doc');
  assert.equal(convertParam('str', 'a%2Fb'), 'a/b');
  assert.equal(convertParam('multipath', 'dir%20one/file.txt'), 'dir one/file.txt');
  assert.equal(convertParam('str', '%E0%A4%A'), undefined);
});

test('convertParam - uuid is lowercased, strings are kept', () => {
  assert.equal(
    convertParam('uuid', '0F8FAD5B-D9CB-469F-A165-70867728950E'),
    '0f8fad5b-d9cb-469f-a165-70867728950e'
  );
  assert.equal(convertParam('str', 'Alice'), 'Alice');
  assert.equal(convertParam('multipath', 'a/b'), 'a/b');
});

test('buildPath - fills parameters and encodes values', () => {
  const pattern = compilePattern('/users/{name}/files/{rest:multipath}');
  assert.equal(
    buildPath(pattern, { name: 'a b', rest: 'docs/q&a.txt' }),
    '/users/a%20b/files/docs/q%26a.txt'
  );
});

test('buildPath - appends a query string', () => {
  const pattern = compilePattern('/search');
  assert.equal(buildPath(pattern, {}, { q: 'x', tag: ['a', 'b'] }), '/search?q=x&tag=a&tag=b');
});

test('buildPath - missing parameter', () => {
  const pattern = compilePattern('/users/{id:int}');
  assert.throws(
    () => buildPath(pattern, {}),
    (error: unknown) => error instanceof SwitchyardError && error.code === 'MISSING_PARAMETER'
  );
});
