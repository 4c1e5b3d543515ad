import { describe, it, expect } from 'vitest'
import { findFact, nutrientsFor, resolveFoods } from './match'
import { testReference } from '../../test-utils'

const ref = testReference()

describe('findFact', () => {
  it('matches exact normalized name', () => {
    expect(findFact(ref, 'Banana')?.name).toBe('banana')
  })

  it('matches aliases and plurals', () => {
    expect(findFact(ref, 'bananas')?.name).toBe('banana')
    expect(findFact(ref, 'boiled eggs')?.name).toBe('egg')
  })

  it('matches a reference name contained in a longer description', () => {
    expect(findFact(ref, 'sautéed spinach with garlic')?.name).toBe('spinach')
  })

  it('does not match inside other words', () => {
    expect(findFact(ref, 'eggplant')).toBeNull()
  })

  it('returns null for unknown food', () => {
    expect(findFact(ref, 'pizza')).toBeNull()
    expect(findFact(ref, '  ')).toBeNull()
  })
})

describe('nutrientsFor', () => {
  it('scales by quantity in the reference unit', () => {
    const spinach = findFact(ref, 'spinach')
    expect(spinach && nutrientsFor(spinach, 50, 'g')).toEqual({ calories: 11.5, folate: 97, iron: 1.35, potassium: 279 })
  })

  it('converts grams to pieces', () => {
    const banana = findFact(ref, 'banana')
    expect(banana && nutrientsFor(banana, 59, 'g')).toEqual({ potassium: 211, folate: 12 })
  })

  it('rounds fractional amounts to 2 decimals', () => {
    const egg = findFact(ref, 'egg')
    expect(egg && nutrientsFor(egg, 1 / 3, 'piece')).toEqual({ folate: 7.33, iron: 0.3, potassium: 21 })
  })
})

describe('resolveFoods', () => {
  it('builds entries for matched foods and lists the rest', () => {
    const { entries, unmatched } = resolveFoods(
      ref,
      [
        { name: 'banana', quantity: 1, unit: 'piece' },
        { name: 'pizza', quantity: 1, unit: 'slice' },
      ],
      42,
      1_700_000_000_000
    )
    expect(entries).toEqual([
      {
        userId: 42,
        timestamp: 1_700_000_000_000,
        foodName: 'banana',
        quantity: 1,
        unit: 'piece',
        nutrients: { potassium: 422, folate: 24 },
      },
    ])
    expect(unmatched).toEqual([{ name: 'pizza', quantity: 1, unit: 'slice' }])
  })

  it('rounds quantities to 2 decimals', () => {
    const { entries } = resolveFoods(ref, [{ name: 'banana', quantity: 0.333333, unit: 'piece' }], 1, 0)
    expect(entries[0].quantity).toBe(0.33)
    expect(entries[0].nutrients).toEqual({ potassium: 139.26, folate: 7.92 })
  })
})
