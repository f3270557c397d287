/**
 * wysiwyg-kit - Path Tests
 */

import { describe, it, expect } from 'vitest'
import { joinPath, listPathToString } from './path'
import { allPlans, plan, planName, planPrice, pricingPathToString, title } from './__fixtures__/pricing'

describe('joinPath', () => {
  it('joins names with dots and indices without', () => {
    expect(joinPath('plans', '[1].name')).toBe('plans[1].name')
    expect(joinPath('author', 'name')).toBe('author.name')
    expect(joinPath('title')).toBe('title')
  })
})

describe('listPathToString', () => {
  const item = (path: 'name'): string => path

  it('serializes every list path shape', () => {
    expect(listPathToString({ kind: 'list' }, item)).toBe('')
    expect(listPathToString({ kind: 'item', index: 2 }, item)).toBe('[2]')
    expect(listPathToString({ kind: 'child', index: 2, path: 'name' }, item)).toBe('[2].name')
  })

  it('keeps a leaf item apart from the item itself', () => {
    const leaf = (): string => ''
    expect(listPathToString({ kind: 'item', index: 0 }, leaf)).toBe('[0]')
    expect(listPathToString({ kind: 'child', index: 0, path: undefined }, leaf)).toBe('[0].value')
  })

  it('gives distinct keys for distinct pricing locations', () => {
    const keys = [title, allPlans, plan(0), planName(0), planPrice(0), planName(1)].map(pricingPathToString)
    expect(keys).toEqual(['title', 'plans', 'plans[0]', 'plans[0].name', 'plans[0].price', 'plans[1].name'])
  })
})
