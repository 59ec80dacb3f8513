/**
 * Sections of the end-of-run summary
 */

export const SUMMARY_SECTIONS = ['failed', 'skipped', 'errors'] as const;

export type SummarySection = typeof SUMMARY_SECTIONS[number];

export const isSummarySection = (name: string): name is SummarySection =>
  SUMMARY_SECTIONS.some((section) => section === name);

/**
 * Set of enabled summary sections.
 * Starts from all sections and only ever shrinks.
 */
export class SummarySections {
  private constructor(private readonly members: ReadonlySet<SummarySection>) {}

  static all(): SummarySections {
    return new SummarySections(new Set(SUMMARY_SECTIONS));
  }

  /**
   * A copy without the named sections; names that are not sections are ignored
   */
  without(names: Iterable<string>): SummarySections {
    const remaining = new Set(this.members);
    for (const name of names) {
      if (isSummarySection(name)) {
        remaining.delete(name);
      }
    }
    return new SummarySections(remaining);
  }

  includes(section: SummarySection): boolean {
    return this.members.has(section);
  }

  /**
   * Members in declaration order
   */
  toArray(): SummarySection[] {
    return SUMMARY_SECTIONS.filter((section) => this.members.has(section));
  }

  equals(other: SummarySections): boolean {
    return this.members.size === other.members.size &&
      this.toArray().every((section) => other.includes(section));
  }
}

/**
 * Effective sections for a --no-summary list
 */
export const computeSections = (suppressed: readonly string[]): SummarySections =>
  SummarySections.all().without(suppressed);

/**
 * Names in a --no-summary list that do not name a section
 */
export const unknownSectionNames = (names: readonly string[]): string[] =>
  [...new Set(names.filter((name) => !isSummarySection(name)))];
