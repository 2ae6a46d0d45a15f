/**
 * Unit tests for request-shape validation
 */

import { describe, it, expect } from 'vitest'
import { parseNewQuestion, parsePage, parseQuizRequest, parseSearchTerm } from './validation'

describe('parsePage', () => {
  it('should default to page 1', () => {
    expect(parsePage(undefined)).toEqual({ ok: true, value: 1 })
  })

  it('should parse a positive integer', () => {
    expect(parsePage('3')).toEqual({ ok: true, value: 3 })
  })

  it('should reject zero and junk', () => {
    expect(parsePage('0')).toEqual({ ok: false, error: 'page must be a positive integer' })
    expect(parsePage('')).toEqual({ ok: false, error: 'page must be a positive integer' })
    expect(parsePage('two')).toEqual({ ok: false, error: 'page must be a positive integer' })
  })
})

describe('parseNewQuestion', () => {
  it('should fill missing fields with null', () => {
    expect(parseNewQuestion({ question: 'Q?' })).toEqual({
      ok: true,
      value: { question: 'Q?', answer: null, category_id: null, difficulty: null },
    })
  })

  it('should ignore unknown fields', () => {
    const result = parseNewQuestion({ answer: 'A', rating: 5 })
    expect(result).toEqual({
      ok: true,
      value: { question: null, answer: 'A', category_id: null, difficulty: null },
    })
  })

  it('should name every field of the wrong type', () => {
    expect(parseNewQuestion({ question: 1, difficulty: 'hard' })).toEqual({
      ok: false,
      error: 'question: Expected string, received number; difficulty: Expected number, received string',
    })
  })

  it('should reject a body that is not an object', () => {
    expect(parseNewQuestion([])).toEqual({
      ok: false,
      error: 'Expected object, received array',
    })
  })
})

describe('parseSearchTerm', () => {
  it('should accept an empty string', () => {
    expect(parseSearchTerm({ search_term: '' })).toEqual({ ok: true, value: '' })
  })

  it('should reject a missing term', () => {
    expect(parseSearchTerm(null)).toEqual({ ok: false, error: 'search_term is required' })
  })
})

describe('parseQuizRequest', () => {
  it('should read the all-categories marker', () => {
    expect(
      parseQuizRequest({ previous_questions: [4, 9], quiz_category: { type: 'click' } })
    ).toEqual({
      ok: true,
      value: { previousQuestions: [4, 9], scope: { kind: 'all' } },
    })
  })

  it('should read a category id', () => {
    expect(
      parseQuizRequest({
        previous_questions: [],
        quiz_category: { type: { id: 3, type: 'History' } },
      })
    ).toEqual({
      ok: true,
      value: { previousQuestions: [], scope: { kind: 'category', categoryId: 3 } },
    })
  })

  it('should check previous_questions before the category', () => {
    expect(parseQuizRequest({ quiz_category: {} })).toEqual({
      ok: false,
      error: 'missing_previous_questions',
    })
    expect(parseQuizRequest({ previous_questions: [1, 'x'] })).toEqual({
      ok: false,
      error: 'invalid_previous_questions',
    })
  })

  it('should report each category problem separately', () => {
    expect(parseQuizRequest({ previous_questions: [] })).toEqual({
      ok: false,
      error: 'missing_category_type',
    })
    expect(
      parseQuizRequest({ previous_questions: [], quiz_category: { type: 7 } })
    ).toEqual({ ok: false, error: 'category_type_not_object' })
    expect(
      parseQuizRequest({ previous_questions: [], quiz_category: { type: { id: true } } })
    ).toEqual({ ok: false, error: 'invalid_category_id' })
  })

  it('should treat a non-object body as missing everything', () => {
    expect(parseQuizRequest('click')).toEqual({
      ok: false,
      error: 'missing_previous_questions',
    })
  })
})
