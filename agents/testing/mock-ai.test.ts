import { describe, it, expect } from 'vitest'
import { mockGenerateText, mockGenerateTextError } from './mock-ai'

describe('mockGenerateText', () => {
  it('returns mock function with expected text', async () => {
    const mockFn = mockGenerateText('{"title":"Lease"}')
    const result = await mockFn()
    expect(result.text).toBe('{"title":"Lease"}')
    expect(result.finishReason).toBe('stop')
    expect(result.usage).toEqual({ inputTokens: 100, outputTokens: 50, totalTokens: 150 })
  })

  it('allows custom token usage', async () => {
    const mockFn = mockGenerateText('{}', { inputTokens: 500, outputTokens: 200 })
    const result = await mockFn()
    expect(result.usage.totalTokens).toBe(700)
  })
})

describe('mockGenerateTextError', () => {
  it('rejects with the given message', async () => {
    await expect(mockGenerateTextError('Gateway timeout')()).rejects.toThrow('Gateway timeout')
  })
})
