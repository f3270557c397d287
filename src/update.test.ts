/**
 * wysiwyg-kit - Update Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import {
  applyEditAction,
  deleteAt,
  draftChanged,
  edit,
  focusComment,
  hoverCommentThread,
  mapAction,
  mapMsg,
  submitDraft,
  unhoverCommentThread,
  update,
} from './update'
import { getComments, getCommentError, getDraft, initState, isSaving } from './state'
import {
  createPricing,
  plan,
  planName,
  planPrice,
  pricingDefinition,
  pricingPathToString,
  title,
  type PlanPath,
  type Pricing,
  type PricingPath,
} from './__fixtures__/pricing'
import type { Comment, Effect, Msg, State } from './types'

const comment = (content: string): Comment => ({
  content,
  author: { name: 'Test User', avatar: 'https://example.com/avatar.png' },
  createdAt: 1700000000000,
})

describe('update', () => {
  let state: State<PricingPath>
  let data: Pricing

  // Run messages in order, returning the last effect
  const run = (...msgs: Msg<PricingPath>[]) => {
    let effect: Effect<PricingPath> | undefined
    for (const msg of msgs) {
      const result = update(pricingDefinition, msg, state, data)
      data = result.data
      state = result.state
      effect = result.effect
    }
    return effect
  }

  beforeEach(() => {
    state = initState(pricingPathToString)
    data = createPricing()
  })

  describe('edits', () => {
    it('applies edits through the definition', () => {
      run(edit(title, 'New Title'), edit(planPrice(1), '20'))
      expect(data.title).toBe('New Title')
      expect(data.plans[1].price).toBe(20)
    })

    it('keeps the previous number for malformed input', () => {
      run(edit(planPrice(1), '20'), edit(planPrice(1), 'abc'))
      expect(data.plans[1].price).toBe(20)
    })

    it('deletes list items', () => {
      run(deleteAt(plan(0)))
      expect(data.plans).toEqual([{ name: 'Pro', price: 15 }])
      expect(pricingDefinition.getString(planName(0), data)).toBe('Pro')
    })

    it('does not touch comment state', () => {
      const before = state
      const effect = run(edit(title, 'x'))
      expect(state).toBe(before)
      expect(effect).toBeUndefined()
    })

    it('applyEditAction matches the definition', () => {
      const next = applyEditAction(pricingDefinition, { op: 'edit', path: planName(0), text: 'Hobby' }, data)
      expect(next.plans[0].name).toBe('Hobby')
    })
  })

  describe('drafts', () => {
    it('stores one draft per path', () => {
      run(draftChanged(title, 'first'), draftChanged(title, 'second'), draftChanged(planName(0), 'other'))
      expect(getDraft(state, title)).toBe('second')
      expect(getDraft(state, planName(0))).toBe('other')
    })
  })

  describe('submitting comments', () => {
    it('ignores blank drafts', () => {
      expect(run(submitDraft(title))).toBeUndefined()
      expect(run(draftChanged(title, '   \n\t'), submitDraft(title))).toBeUndefined()
      expect(getComments(state, title)).toEqual([])
      expect(isSaving(state, title)).toBe(false)
    })

    it('emits one createComment effect and keeps the draft', () => {
      const effect = run(draftChanged(title, 'Looks good'), submitDraft(title))

      expect(effect).toMatchObject({ type: 'createComment', path: title, text: 'Looks good' })
      expect(getDraft(state, title)).toBe('Looks good')
      expect(isSaving(state, title)).toBe(true)
      expect(getComments(state, title)).toEqual([])
    })

    it('appends the created comment and clears the draft', () => {
      state = initState(pricingPathToString, { title: [comment('older')] })

      const effect = run(draftChanged(title, 'Looks good'), submitDraft(title))
      if (!effect) throw new Error('expected an effect')
      run(effect.respond({ success: true, comment: comment('Looks good') }))

      expect(getComments(state, title).map((c) => c.content)).toEqual(['older', 'Looks good'])
      expect(getDraft(state, title)).toBe('')
      expect(isSaving(state, title)).toBe(false)
    })

    it('builds the response for the submitted path', () => {
      const effect = run(draftChanged(planPrice(1), 'why 15?'), submitDraft(planPrice(1)))
      if (!effect) throw new Error('expected an effect')
      expect(effect.respond({ success: false, error: 'offline' })).toEqual({
        type: 'createCommentResponse',
        path: planPrice(1),
        result: { success: false, error: 'offline' },
      })
    })

    it('does not submit again while a comment is saving', () => {
      run(draftChanged(title, 'once'))
      expect(run(submitDraft(title))).toBeDefined()
      expect(run(submitDraft(title))).toBeUndefined()
    })

    it('keeps the draft and records the error when creation fails', () => {
      const effect = run(draftChanged(title, 'retry me'), submitDraft(title))
      if (!effect) throw new Error('expected an effect')
      run(effect.respond({ success: false, error: 'offline' }))

      expect(getDraft(state, title)).toBe('retry me')
      expect(getCommentError(state, title)).toBe('offline')
      expect(isSaving(state, title)).toBe(false)
      expect(getComments(state, title)).toEqual([])

      const retry = run(submitDraft(title))
      expect(retry).toMatchObject({ type: 'createComment', text: 'retry me' })
      expect(getCommentError(state, title)).toBeUndefined()
    })

    it('clears the error once the draft changes', () => {
      const effect = run(draftChanged(title, 'x'), submitDraft(title))
      if (!effect) throw new Error('expected an effect')
      run(effect.respond({ success: false, error: 'offline' }), draftChanged(title, 'xy'))
      expect(getCommentError(state, title)).toBeUndefined()
    })
  })

  describe('focus and hover', () => {
    it('keeps a single focused thread', () => {
      run(focusComment(title), focusComment(planName(1)))
      expect(state.focusedCommentThread).toBe('plans[1].name')
    })

    it('keeps a single hovered thread and clears it', () => {
      run(hoverCommentThread(title), hoverCommentThread(planPrice(0)))
      expect(state.hoveredCommentThread).toBe('plans[0].price')

      run(unhoverCommentThread())
      expect(state.hoveredCommentThread).toBeUndefined()
    })
  })
})

describe('path remapping', () => {
  const inject = (path: PlanPath): PricingPath => ({ kind: 'plans', path: { kind: 'child', index: 0, path } })

  it('mapAction rewrites only the path', () => {
    expect(mapAction(inject, { op: 'edit', path: { kind: 'name' }, text: 'Hobby' })).toEqual({
      op: 'edit',
      path: planName(0),
      text: 'Hobby',
    })
    expect(mapAction(inject, { op: 'delete', path: { kind: 'price' } })).toEqual({ op: 'delete', path: planPrice(0) })
  })

  it('mapMsg rewrites the path of every message', () => {
    const result = { success: true as const, comment: comment('hi') }
    const name: PlanPath = { kind: 'name' }

    expect(mapMsg(inject, edit(name, 'x'))).toEqual(edit(planName(0), 'x'))
    expect(mapMsg(inject, draftChanged(name, 'x'))).toEqual(draftChanged(planName(0), 'x'))
    expect(mapMsg(inject, submitDraft(name))).toEqual(submitDraft(planName(0)))
    expect(mapMsg(inject, focusComment(name))).toEqual(focusComment(planName(0)))
    expect(mapMsg(inject, hoverCommentThread(name))).toEqual(hoverCommentThread(planName(0)))
    expect(mapMsg(inject, unhoverCommentThread<PlanPath>())).toEqual(unhoverCommentThread())
    expect(mapMsg(inject, { type: 'createCommentResponse', path: name, result })).toEqual({
      type: 'createCommentResponse',
      path: planName(0),
      result,
    })
  })

  it('edits applied through mapped messages reach the nested field', () => {
    const data = createPricing()
    const next = update(pricingDefinition, mapMsg(inject, edit<PlanPath>({ kind: 'name' }, 'Hobby')), initState(pricingPathToString), data)
    expect(next.data.plans[0].name).toBe('Hobby')
  })
})
