/**
 * Tests for the logger utility
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createLogger, childLogger } from '../src/utils/logger.js'

describe('Logger Utility', () => {
  describe('createLogger', () => {
    it('creates a logger with the specified level', () => {
      const log = createLogger('monitor', { level: 'error', pretty: false })
      expect(log.level).toBe('error')
      expect(typeof log.warn).toBe('function')
    })

    it('creates distinct loggers per module', () => {
      const a = createLogger('registry', { pretty: false })
      const b = createLogger('orchestrator', { pretty: false })
      expect(a).not.toBe(b)
    })
  })

  describe('childLogger', () => {
    it('inherits the parent level and logs with bindings', () => {
      const parent = createLogger('supervisor', { level: 'warn', pretty: false })
      const child = childLogger(parent, { service: 'gpu' })
      expect(child.level).toBe('warn')
      expect(() => {
        child.warn('probe failed')
      }).not.toThrow()
    })
  })

  describe('environment-based configuration', () => {
    let originalEnv: NodeJS.ProcessEnv

    beforeEach(() => {
      originalEnv = { ...process.env }
      delete process.env.SVCWARD_LOG_LEVEL
      delete process.env.LOG_LEVEL
    })

    afterEach(() => {
      process.env = originalEnv
    })

    it('prefers SVCWARD_LOG_LEVEL over LOG_LEVEL', () => {
      process.env.SVCWARD_LOG_LEVEL = 'error'
      process.env.LOG_LEVEL = 'debug'
      expect(createLogger('env-test', { pretty: false }).level).toBe('error')
    })

    it('uses LOG_LEVEL when set', () => {
      process.env.LOG_LEVEL = 'warn'
      expect(createLogger('env-test', { pretty: false }).level).toBe('warn')
    })

    it('uses info in production', () => {
      process.env.NODE_ENV = 'production'
      expect(createLogger('prod-test', { pretty: false }).level).toBe('info')
    })

    it('only logs warnings by default outside development and test', () => {
      delete process.env.NODE_ENV
      expect(createLogger('cli', { pretty: false }).level).toBe('warn')
    })
  })
})
