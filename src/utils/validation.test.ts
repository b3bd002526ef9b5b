// src/utils/validation.test.ts
import { describe, expect, it } from 'vitest'
import { validateLanguageCode, validateNumericInput, validateTextInput } from './validation.js'

describe('validateTextInput', () => {
  it('trims and accepts text', () => {
    expect(validateTextInput('  hello ')).toEqual({ valid: true, sanitized: 'hello' })
  })

  it('treats missing input as empty unless empty is disallowed', () => {
    expect(validateTextInput(undefined)).toEqual({ valid: true, sanitized: '' })
    expect(validateTextInput(undefined, { allowEmpty: false })).toEqual({ valid: false, error: 'Input is required' })
    expect(validateTextInput('   ', { allowEmpty: false })).toEqual({ valid: false, error: 'Input cannot be empty' })
  })

  it('enforces length limits and type', () => {
    expect(validateTextInput('abcdef', { maxLength: 3 }).error).toBe('Input exceeds maximum length of 3 characters')
    expect(validateTextInput('ab', { minLength: 3 }).error).toBe('Input must be at least 3 characters')
    expect(validateTextInput(7).error).toBe('Input must be a string')
  })
})

describe('validateNumericInput', () => {
  it('accepts numbers and numeric strings', () => {
    expect(validateNumericInput(' 250 ')).toEqual({ valid: true, sanitized: '250' })
    expect(validateNumericInput(0.25)).toEqual({ valid: true, sanitized: '0.25' })
  })

  it('rejects partial numbers and empty values', () => {
    expect(validateNumericInput('12abc').error).toBe('Input must be a valid number')
    expect(validateNumericInput('').error).toBe('Numeric input is required')
    expect(validateNumericInput(true).error).toBe('Input must be a valid number')
  })

  it('applies bounds', () => {
    expect(validateNumericInput(0, { min: 0, exclusiveMin: true }).error).toBe('Input must be greater than 0')
    expect(validateNumericInput(-1, { min: 0 }).error).toBe('Input must be at least 0')
    expect(validateNumericInput(11, { max: 10 }).error).toBe('Input must be at most 10')
    expect(validateNumericInput(1.5, { allowDecimal: false }).error).toBe('Input must be an integer')
    expect(validateNumericInput(-2, { allowNegative: false }).error).toBe('Input must be non-negative')
  })
})

describe('validateLanguageCode', () => {
  it('normalizes case', () => {
    expect(validateLanguageCode('JA')).toEqual({ valid: true, sanitized: 'ja' })
    expect(validateLanguageCode('pt-br')).toEqual({ valid: true, sanitized: 'pt-BR' })
  })

  it('only allows auto when asked to', () => {
    expect(validateLanguageCode('Auto', { allowAuto: true })).toEqual({ valid: true, sanitized: 'auto' })
    expect(validateLanguageCode('auto').error).toBe('Auto-detect is only allowed for the source language')
  })

  it('rejects malformed codes', () => {
    expect(validateLanguageCode('').error).toBe('Language code is required')
    expect(validateLanguageCode('english').error).toBe('Invalid language code format')
    expect(validateLanguageCode('e1').error).toBe('Invalid language code format')
  })
})
