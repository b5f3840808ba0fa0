/**
 * Tests for error-codes.ts utility functions
 */

import { describe, it, expect } from 'vitest'
import { ErrorCodes, isValidErrorCode, getErrorCategory } from '../src/error-codes.js'

describe('Error Codes', () => {
  describe('ErrorCodes constant', () => {
    it('uses the key as the value for every code', () => {
      for (const [key, value] of Object.entries(ErrorCodes)) {
        expect(value).toBe(key)
      }
    })

    it('should have query error codes', () => {
      expect(ErrorCodes.QUERY_UNBOUND).toBe('QUERY_UNBOUND')
      expect(ErrorCodes.QUERY_PARAMETER_MISSING).toBe('QUERY_PARAMETER_MISSING')
    })
  })

  describe('isValidErrorCode', () => {
    it('should return true for valid error codes', () => {
      expect(isValidErrorCode('FIELD_VALIDATION_FAILED')).toBe(true)
      expect(isValidErrorCode('SCHEMA_UNCONSTRAINED_WHERE')).toBe(true)
      expect(isValidErrorCode('DB_UNIQUE_VIOLATION')).toBe(true)
    })

    it('should return false for invalid error codes', () => {
      expect(isValidErrorCode('INVALID_CODE')).toBe(false)
      expect(isValidErrorCode('')).toBe(false)
      expect(isValidErrorCode('23505')).toBe(false)
    })
  })

  describe('getErrorCategory', () => {
    it('extracts the prefix before the first underscore', () => {
      expect(getErrorCategory('FIELD_CONTEXT_REQUIRED')).toBe('FIELD')
      expect(getErrorCategory('SCHEMA_VIOLATION')).toBe('SCHEMA')
      expect(getErrorCategory('QUERY_RESULT_INVALID')).toBe('QUERY')
      expect(getErrorCategory('TRANSACTION_VERIFICATION_FAILED')).toBe('TRANSACTION')
      expect(getErrorCategory('DB_CHECK_VIOLATION')).toBe('DB')
    })
  })
})
