/**
 * Slug Utilities Tests
 */

import { describe, it, expect } from 'vitest'
import { normalizeSlugPart, slugFor } from '../../src/utils/slug'
import { FIXED_NOW } from '../factories'

describe('normalizeSlugPart', () => {
  it.each([
    ['Hello World', 'hello-world'],
    ['Hello, World!', 'hello-world'],
    ['  padded  ', 'padded'],
    ['many   spaces -- and dashes', 'many-spaces-and-dashes'],
    ['Crème Brûlée', 'creme-brulee'],
    ['Déjà Vu', 'deja-vu'],
    ['你好世界', 'ni-hao-shi-jie'],
    ['Привет мир', 'privet-mir'],
    ['2026-10-18T09:30:00.000Z', '2026-10-18t09-30-00-000z'],
    ['!!!', ''],
    ['', ''],
  ])('normalizes %j to %j', (input, expected) => {
    expect(normalizeSlugPart(input)).toBe(expected)
  })

  it.each(['Ελληνικά', 'こんにちは', '안녕하세요'])('transliterates %j to ASCII letters', (title) => {
    expect(normalizeSlugPart(title)).toMatch(/^[a-z]+(?:-[a-z]+)*$/)
  })

  it('only emits lowercase ASCII letters, digits and single separators', () => {
    const slug = normalizeSlugPart('  Über -- Straße & Café (2026)!  ')
    expect(slug).toMatch(/^[a-z0-9]+(?:-[a-z0-9]+)*$/)
  })
})

describe('slugFor', () => {
  it('prefixes the normalized title with the normalized timestamp', () => {
    expect(slugFor('Hello World', FIXED_NOW)).toBe('2026-10-18t09-30-00-000z-hello-world')
  })

  it('keeps a title written in a non-Latin script', () => {
    expect(slugFor('你好世界', FIXED_NOW)).toBe('2026-10-18t09-30-00-000z-ni-hao-shi-jie')
  })

  it('is deterministic for the same title and time', () => {
    expect(slugFor('Same', FIXED_NOW)).toBe(slugFor('Same', new Date(FIXED_NOW.getTime())))
  })

  it('differs when the creation time differs by a millisecond', () => {
    const later = new Date(FIXED_NOW.getTime() + 1)
    expect(slugFor('Same', later)).toBe('2026-10-18t09-30-00-001z-same')
    expect(slugFor('Same', later)).not.toBe(slugFor('Same', FIXED_NOW))
  })

  it('falls back to the timestamp alone for a title with no letters or digits', () => {
    expect(slugFor('???', FIXED_NOW)).toBe('2026-10-18t09-30-00-000z')
    expect(slugFor('', FIXED_NOW)).toBe('2026-10-18t09-30-00-000z')
  })
})
