import { describe, it, expect } from 'vitest'
import {
  type Attribution,
  AttributionPresets,
  AttributionUtils,
  LinkAttribution,
  NamedAttribution
} from './attribution'

describe('Attributions', () => {
  describe('NamedAttribution', () => {
    it('should be equal to another with the same name', () => {
      expect(new NamedAttribution('bold').equals(AttributionPresets.BOLD)).toBe(true)
      expect(AttributionPresets.BOLD.equals(AttributionPresets.ITALICS)).toBe(false)
    })

    it('should only merge with an equal attribution', () => {
      expect(AttributionPresets.BOLD.canMergeWith(new NamedAttribution('bold'))).toBe(true)
      expect(AttributionPresets.BOLD.canMergeWith(AttributionPresets.UNDERLINE)).toBe(false)
    })

    it('should not equal a link sharing its id', () => {
      expect(new NamedAttribution('link').equals(AttributionPresets.link('https://example.com'))).toBe(false)
    })
  })

  describe('LinkAttribution', () => {
    it('should share one lane across urls', () => {
      const a = AttributionPresets.link('https://a.example')
      const b = AttributionPresets.link('https://b.example')

      expect(a.id).toBe('link')
      expect(b.id).toBe('link')
      expect(a.equals(b)).toBe(false)
      expect(a.canMergeWith(b)).toBe(false)
      expect(a.canMergeWith(new LinkAttribution('https://a.example'))).toBe(true)
    })

    it('should describe itself with its url', () => {
      expect(`${AttributionPresets.link('https://example.com')}`).toBe('LinkAttribution(https://example.com)')
    })
  })

  describe('AttributionUtils', () => {
    it('should add each attribution once', () => {
      const set: Attribution[] = []

      AttributionUtils.add(set, AttributionPresets.BOLD)
      AttributionUtils.add(set, new NamedAttribution('bold'))
      AttributionUtils.add(set, AttributionPresets.ITALICS)

      expect(set).toEqual([AttributionPresets.BOLD, AttributionPresets.ITALICS])
    })

    it('should report whether something was removed', () => {
      const set: Attribution[] = [AttributionPresets.BOLD]

      expect(AttributionUtils.remove(set, AttributionPresets.ITALICS)).toBe(false)
      expect(AttributionUtils.remove(set, new NamedAttribution('bold'))).toBe(true)
      expect(set).toEqual([])
    })

    it('should deduplicate keeping the first occurrence', () => {
      const first = new NamedAttribution('bold')
      const unique = AttributionUtils.unique([first, AttributionPresets.ITALICS, AttributionPresets.BOLD])

      expect(unique).toHaveLength(2)
      expect(unique[0]).toBe(first)
    })

    it('should put attributions in one lane only when they merge both ways', () => {
      const { BOLD, ITALICS } = AttributionPresets

      expect(AttributionUtils.sameLane(BOLD, new NamedAttribution('bold'))).toBe(true)
      expect(AttributionUtils.sameLane(BOLD, ITALICS)).toBe(false)
      expect(AttributionUtils.sameLane(
        AttributionPresets.link('https://a.example'),
        AttributionPresets.link('https://b.example')
      )).toBe(false)
    })

    it('should compare sets regardless of order and duplicates', () => {
      const { BOLD, ITALICS } = AttributionPresets

      expect(AttributionUtils.sameMembers([BOLD, ITALICS], [ITALICS, BOLD, BOLD])).toBe(true)
      expect(AttributionUtils.sameMembers([BOLD], [BOLD, ITALICS])).toBe(false)
      expect(AttributionUtils.sameMembers([], [])).toBe(true)
    })
  })
})
