/**
 * wysiwyg-kit - Comment State Tests
 */

import { describe, it, expect } from 'vitest'
import {
  focusState,
  getCommentError,
  getComments,
  getDraft,
  initState,
  isFocused,
  isHovered,
  isSaving,
  threadKey,
} from './state'
import { update, draftChanged, focusComment, mapMsg } from './update'
import { pricingDefinition, pricingPathToString, createPricing, type PlanPath, type PricingPath } from './__fixtures__/pricing'
import type { Comment } from './types'

const comment = (content: string): Comment => ({
  content,
  author: { name: 'Test User', avatar: 'https://example.com/avatar.png' },
  createdAt: 1700000000000,
})

describe('initState', () => {
  it('starts with the given threads and nothing else', () => {
    const state = initState(pricingPathToString, { title: [comment('first'), comment('second')] })
    const path: PricingPath = { kind: 'title' }

    expect(getComments(state, path).map((c) => c.content)).toEqual(['first', 'second'])
    expect(getDraft(state, path)).toBe('')
    expect(isSaving(state, path)).toBe(false)
    expect(getCommentError(state, path)).toBeUndefined()
    expect(state.focusedCommentThread).toBeUndefined()
    expect(state.hoveredCommentThread).toBeUndefined()
  })

  it('has no comments for unknown threads', () => {
    const state = initState(pricingPathToString)
    expect(getComments(state, { kind: 'logo' })).toEqual([])
  })
})

describe('focusState', () => {
  // Plan 1 of the pricing page
  const inject = (path: PlanPath): PricingPath => ({
    kind: 'plans',
    path: { kind: 'child', index: 1, path },
  })

  it('serializes through the outer path', () => {
    const state = initState(pricingPathToString)
    const focused = focusState(inject, state)
    expect(threadKey(focused, { kind: 'price' })).toBe('plans[1].price')
  })

  it('shares the comment maps of the outer state', () => {
    const state = initState(pricingPathToString, { 'plans[1].name': [comment('rename?')] })
    const focused = focusState(inject, state)

    expect(focused.comments).toBe(state.comments)
    expect(getComments(focused, { kind: 'name' }).map((c) => c.content)).toEqual(['rename?'])
  })

  it('reads changes made through mapped messages', () => {
    const state = initState(pricingPathToString)
    const data = createPricing()

    let next = update(pricingDefinition, mapMsg(inject, draftChanged<PlanPath>({ kind: 'price' }, 'too cheap')), state, data).state
    next = update(pricingDefinition, mapMsg(inject, focusComment<PlanPath>({ kind: 'price' })), next, data).state

    const focused = focusState(inject, next)
    expect(getDraft(focused, { kind: 'price' })).toBe('too cheap')
    expect(isFocused(focused, { kind: 'price' })).toBe(true)
    expect(isHovered(focused, { kind: 'price' })).toBe(false)
  })
})
