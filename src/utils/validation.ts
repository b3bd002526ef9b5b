// src/utils/validation.ts

/**
 * Validation utilities for user input
 * Used for environment values, command line flags and stored preferences
 */

export interface ValidationResult {
  valid: boolean
  error?: string
  sanitized?: string
}

/**
 * Validate and sanitize text input
 */
export function validateTextInput(
  text: unknown,
  options: {
    maxLength?: number
    minLength?: number
    allowEmpty?: boolean
    trim?: boolean
  } = {}
): ValidationResult {
  const {
    maxLength = 10000,
    minLength = 0,
    allowEmpty = true,
    trim = true
  } = options

  // Check if input is provided
  if (text === undefined || text === null) {
    if (allowEmpty) {
      return { valid: true, sanitized: '' }
    }
    return { valid: false, error: 'Input is required' }
  }

  if (typeof text !== 'string') {
    return { valid: false, error: 'Input must be a string' }
  }

  const sanitized = trim ? text.trim() : text

  // Check empty after trim
  if (!sanitized && !allowEmpty) {
    return { valid: false, error: 'Input cannot be empty' }
  }

  if (sanitized.length > maxLength) {
    return {
      valid: false,
      error: `Input exceeds maximum length of ${maxLength} characters`
    }
  }

  if (sanitized.length < minLength) {
    return {
      valid: false,
      error: `Input must be at least ${minLength} characters`
    }
  }

  return { valid: true, sanitized }
}

/**
 * Validate numeric input
 */
export function validateNumericInput(
  value: unknown,
  options: {
    min?: number
    max?: number
    allowNegative?: boolean
    allowDecimal?: boolean
    exclusiveMin?: boolean
  } = {}
): ValidationResult {
  const {
    min = Number.NEGATIVE_INFINITY,
    max = Number.POSITIVE_INFINITY,
    allowNegative = true,
    allowDecimal = true,
    exclusiveMin = false
  } = options

  if (value === undefined || value === null || value === '') {
    return { valid: false, error: 'Numeric input is required' }
  }

  if (typeof value !== 'string' && typeof value !== 'number') {
    return { valid: false, error: 'Input must be a valid number' }
  }

  // Number() rather than parseFloat so "12abc" is rejected
  const num = typeof value === 'string' ? Number(value.trim()) : value

  if (!Number.isFinite(num)) {
    return { valid: false, error: 'Input must be a valid number' }
  }

  if (!allowNegative && num < 0) {
    return { valid: false, error: 'Input must be non-negative' }
  }

  if (!allowDecimal && !Number.isInteger(num)) {
    return { valid: false, error: 'Input must be an integer' }
  }

  if (exclusiveMin ? num <= min : num < min) {
    return { valid: false, error: `Input must be ${exclusiveMin ? 'greater than' : 'at least'} ${min}` }
  }

  if (num > max) {
    return { valid: false, error: `Input must be at most ${max}` }
  }

  return { valid: true, sanitized: String(num) }
}

/**
 * Validate language code format (ja, en, zh-CN, pt-BR...)
 */
export function validateLanguageCode(
  code: unknown,
  options: { allowAuto?: boolean } = {}
): ValidationResult {
  if (!code || typeof code !== 'string') {
    return { valid: false, error: 'Language code is required' }
  }

  const trimmed = code.trim()
  if (trimmed.toLowerCase() === 'auto') {
    return options.allowAuto
      ? { valid: true, sanitized: 'auto' }
      : { valid: false, error: 'Auto-detect is only allowed for the source language' }
  }

  const match = /^([a-zA-Z]{2,3})(?:-([a-zA-Z]{2,4}))?$/.exec(trimmed)
  if (!match) {
    return { valid: false, error: 'Invalid language code format' }
  }

  const [, primary, region] = match
  const sanitized = region ? `${primary.toLowerCase()}-${region.toUpperCase()}` : primary.toLowerCase()
  return { valid: true, sanitized }
}
