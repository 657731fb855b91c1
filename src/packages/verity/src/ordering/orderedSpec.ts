import { bracketed } from '../formatting';
import { Spec } from '../spec/spec';
import { partialCompare, type Orderable, type Ordering } from './comparable';

/**
 * Relational assertions for subjects that can be ordered.
 *
 * Each predicate passes only when the relation is established. Operands that
 * cannot be compared (`NaN`, invalid dates, a declining `compareTo`) fail.
 */
export class OrderedSpec<T extends Orderable> extends Spec<T> {
  /**
   * ```typescript
   * assertThat(1).isLessThan(2);
   * ```
   */
  public isLessThan(other: T): this {
    return this.holds(other, (ordering) => ordering < 0, 'value less than');
  }

  /**
   * ```typescript
   * assertThat(2).isLessThanOrEqualTo(2);
   * ```
   */
  public isLessThanOrEqualTo(other: T): this {
    return this.holds(
      other,
      (ordering) => ordering <= 0,
      'value less than or equal to',
    );
  }

  /**
   * ```typescript
   * assertThat(2).isGreaterThan(1);
   * ```
   */
  public isGreaterThan(other: T): this {
    return this.holds(other, (ordering) => ordering > 0, 'value greater than');
  }

  /**
   * ```typescript
   * assertThat(2).isGreaterThanOrEqualTo(1);
   * ```
   */
  public isGreaterThanOrEqualTo(other: T): this {
    return this.holds(
      other,
      (ordering) => ordering >= 0,
      'value greater than or equal to',
    );
  }

  private holds(
    other: T,
    relation: (ordering: Ordering) => boolean,
    expectation: string,
  ): this {
    const ordering = partialCompare(this.subject, other);

    if (ordering === undefined || !relation(ordering)) {
      this.withExpected(
        `${expectation} ${bracketed(other, this.formatOptions)}`,
      )
        .withActual(bracketed(this.subject, this.formatOptions))
        .fail();
    }

    return this;
  }
}
