import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { basicAwarenessSchema, breathingSchema, requestFrameSchema, saySchema } from '../../src/api/schema'

describe('requestFrameSchema', () => {
  it('accepts a minimal frame', () => {
    expect(requestFrameSchema.parse({ commandName: 'WakeUp' })).toEqual({ commandName: 'WakeUp' })
  })

  it('accepts string and numeric request ids', () => {
    expect(requestFrameSchema.parse({ commandName: 'Say', requestId: 'abc' }).requestId).toBe('abc')
    expect(requestFrameSchema.parse({ commandName: 'Say', requestId: 3 }).requestId).toBe(3)
  })

  it('rejects an empty command name', () => {
    expect(() => requestFrameSchema.parse({ commandName: '' })).toThrow(ZodError)
  })

  it('rejects an empty request id', () => {
    expect(() => requestFrameSchema.parse({ commandName: 'Say', requestId: '' })).toThrow(ZodError)
  })
})

describe('saySchema', () => {
  it('accepts empty text', () => {
    expect(saySchema.parse({ text: '' })).toEqual({ text: '' })
  })

  it('rejects non-string text', () => {
    expect(() => saySchema.parse({ text: 42 })).toThrow(ZodError)
  })
})

describe('basicAwarenessSchema', () => {
  it('accepts the documented modes', () => {
    expect(() =>
      basicAwarenessSchema.parse({ enabled: true, engagementMode: 'SemiEngaged', trackingMode: 'MoveContextually' })
    ).not.toThrow()
  })

  it('rejects unknown tracking modes', () => {
    const result = basicAwarenessSchema.safeParse({ enabled: true, engagementMode: 'Unengaged', trackingMode: 'Eyes' })

    expect(result.success).toBe(false)
    expect(result.error?.issues[0].path).toEqual(['trackingMode'])
  })
})

describe('breathingSchema', () => {
  it('accepts every breathing chain', () => {
    for (const chainName of ['Body', 'Legs', 'Arms', 'LArm', 'RArm', 'Head']) {
      expect(breathingSchema.parse({ enabled: false, chainName })).toEqual({ enabled: false, chainName })
    }
  })

  it('rejects unknown chains', () => {
    expect(() => breathingSchema.parse({ enabled: true, chainName: 'Tail' })).toThrow(ZodError)
  })
})
