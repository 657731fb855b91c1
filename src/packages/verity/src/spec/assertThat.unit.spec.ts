import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { AssertionError, ValidationError } from '../errors';
import { OrderedSpec } from '../ordering';
import { asserting, assertThat } from './assertThat';
import { Spec } from './spec';

const capturedLocation =
  /\n\n\tat location: .*assertThat\.unit\.spec\.ts:\d+:\d+\n$/;

void describe('assertThat', () => {
  void it('gives orderable subjects the ordering predicates', () => {
    assert.ok(assertThat(1) instanceof OrderedSpec);
    assert.ok(assertThat(1n) instanceof OrderedSpec);
    assert.ok(assertThat('a') instanceof OrderedSpec);
    assert.ok(assertThat(new Date(0)) instanceof OrderedSpec);
    assert.ok(assertThat(true) instanceof OrderedSpec);
    assert.ok(assertThat({ compareTo: () => 0 }) instanceof OrderedSpec);
  });

  void it('gives other subjects a plain container', () => {
    const spec = assertThat({ retries: 3 });

    assert.ok(spec instanceof Spec);
    assert.equal(spec instanceof OrderedSpec, false);
  });

  void it('names the subject from options', () => {
    assert.throws(() => assertThat(3, { name: 'attempts' }).isLessThan(2), {
      message:
        '\n\tfor subject [attempts]\n\texpected: value less than <2>\n\t but was: <3>',
    });
  });

  void it('uses the given location', () => {
    assert.throws(
      () => assertThat(3, { location: 'retry.ts:4:2' }).isLessThan(2),
      {
        message:
          '\n\texpected: value less than <2>\n\t but was: <3>\n\n\tat location: retry.ts:4:2\n',
      },
    );
  });

  void it('captures the calling location when asked', () => {
    assert.throws(
      () => assertThat(3, { captureLocation: true }).isLessThan(2),
      (error) =>
        error instanceof AssertionError &&
        capturedLocation.test(error.message),
    );
  });

  void it('renders values with the given format options', () => {
    const spec = assertThat('abcdef', { format: { maxStringLength: 3 } });

    assert.throws(() => spec.isLessThan('abc'), {
      message:
        "\n\texpected: value less than <'abc'>\n\t but was: <'abc'... 3 more characters>",
    });
  });

  void it('rejects invalid options', () => {
    assert.throws(() => assertThat(1, { name: '' }), ValidationError);
    assert.throws(
      () => assertThat(1, { format: { depth: -1 } }),
      ValidationError,
    );
  });
});

void describe('asserting', () => {
  void it('prefixes failures with the description', () => {
    assert.throws(() => asserting('retry budget').that(4).isLessThan(3), {
      message:
        '\n\tretry budget:\n\texpected: value less than <3>\n\t but was: <4>',
    });
  });

  void it('passes like assertThat', () => {
    assert.doesNotThrow(() =>
      asserting('retry budget').that(2).isLessThanOrEqualTo(3),
    );
  });

  void it('combines description and subject name', () => {
    assert.throws(
      () =>
        asserting('retry budget')
          .that(4, { name: 'attempts' })
          .isLessThanOrEqualTo(3),
      {
        message:
          '\n\tretry budget:\n\tfor subject [attempts]\n\texpected: value less than or equal to <3>\n\t but was: <4>',
      },
    );
  });

  void it('captures the calling location when asked', () => {
    assert.throws(
      () =>
        asserting('retry budget')
          .that(4, { captureLocation: true })
          .isLessThan(3),
      (error) =>
        error instanceof AssertionError &&
        capturedLocation.test(error.message),
    );
  });

  void it('rejects an empty description', () => {
    assert.throws(() => asserting(''), ValidationError);
  });
});
