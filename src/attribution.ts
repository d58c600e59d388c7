/**
 * Attributions
 *
 * An attribution is the label carried by a span: bold, italics, a link, or
 * any custom tag. The span engine never looks inside an attribution; it only
 * needs three things from it:
 * - an `id` that decides which lane the attribution lives on
 * - structural equality, to find the markers that belong to it
 * - `canMergeWith()`, to decide whether two same-lane attributions may share
 *   a run of content
 *
 * @module attribution
 */

/**
 * Capability every attribution must provide
 *
 * `id` and `equals()` are deliberately separate: two attributions may share a
 * lane (same `id`) without being equal, e.g. two links with different URLs.
 */
export interface Attribution {
  /**
   * Lane identity. Attributions with the same id can never overlap
   * unless they are mergeable.
   */
  readonly id: string

  /**
   * Structural equality
   */
  equals(other: Attribution): boolean

  /**
   * Whether this attribution may occupy the same run as `other`.
   * Must be reflexive.
   */
  canMergeWith(other: Attribution): boolean

  toString(): string
}

/**
 * Returns `true` when the given candidate attribution should be selected
 */
export type AttributionFilter = (candidate: Attribution) => boolean

/**
 * Attribution identified only by its name
 *
 * Two named attributions share a lane iff their names match, and they
 * always merge with each other when they do.
 *
 * @example
 * ```typescript
 * const bold = new NamedAttribution('bold')
 * bold.equals(new NamedAttribution('bold')) // true
 * ```
 */
export class NamedAttribution implements Attribution {
  constructor(public readonly id: string) {}

  equals(other: Attribution): boolean {
    return other instanceof NamedAttribution && other.id === this.id
  }

  canMergeWith(other: Attribution): boolean {
    return this.equals(other)
  }

  toString(): string {
    return `NamedAttribution(${this.id})`
  }
}

/**
 * Hyperlink attribution
 *
 * All links share the `link` lane. Links only merge with links pointing at
 * the same URL, so applying a second URL over part of an existing link is
 * a conflict.
 */
export class LinkAttribution implements Attribution {
  public readonly id = 'link'

  constructor(public readonly url: string) {}

  equals(other: Attribution): boolean {
    return other instanceof LinkAttribution && other.url === this.url
  }

  canMergeWith(other: Attribution): boolean {
    return this.equals(other)
  }

  toString(): string {
    return `LinkAttribution(${this.url})`
  }
}

/**
 * Helpers for treating arrays as sets of attributions
 *
 * `Set` compares objects by reference, so attribution sets are arrays
 * deduplicated with `equals()`.
 */
export const AttributionUtils = {
  /**
   * Check if `attribution` is in `attributions`
   */
  includes(attributions: readonly Attribution[], attribution: Attribution): boolean {
    return attributions.some(a => a.equals(attribution))
  },

  /**
   * Add `attribution` to `attributions` unless an equal one is present.
   * Mutates and returns `attributions`.
   */
  add(attributions: Attribution[], attribution: Attribution): Attribution[] {
    if (!AttributionUtils.includes(attributions, attribution)) {
      attributions.push(attribution)
    }
    return attributions
  },

  /**
   * Remove the attribution equal to `attribution`, if any.
   * Mutates `attributions` and returns whether something was removed.
   */
  remove(attributions: Attribution[], attribution: Attribution): boolean {
    const index = attributions.findIndex(a => a.equals(attribution))
    if (index < 0) {
      return false
    }
    attributions.splice(index, 1)
    return true
  },

  /**
   * Deduplicate, keeping the first occurrence of each attribution
   */
  unique(attributions: Iterable<Attribution>): Attribution[] {
    const result: Attribution[] = []
    for (const attribution of attributions) {
      AttributionUtils.add(result, attribution)
    }
    return result
  },

  /**
   * Check if two attributions share a lane: same `id`, and each can merge
   * with the other
   */
  sameLane(a: Attribution, b: Attribution): boolean {
    return a.id === b.id && a.canMergeWith(b) && b.canMergeWith(a)
  },

  /**
   * Check if two attribution sets hold the same members, in any order
   */
  sameMembers(a: readonly Attribution[], b: readonly Attribution[]): boolean {
    const left = AttributionUtils.unique(a)
    const right = AttributionUtils.unique(b)
    return (
      left.length === right.length &&
      left.every(attribution => AttributionUtils.includes(right, attribution))
    )
  }
}

/**
 * Attributions for common formatting
 */
export const AttributionPresets = {
  BOLD: new NamedAttribution('bold'),
  ITALICS: new NamedAttribution('italics'),
  UNDERLINE: new NamedAttribution('underline'),
  STRIKETHROUGH: new NamedAttribution('strikethrough'),

  /**
   * Create a link attribution
   */
  link(url: string): LinkAttribution {
    return new LinkAttribution(url)
  }
}
