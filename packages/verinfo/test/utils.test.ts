import { describe, expect, it } from 'vitest'
import { colors, escapeRegExp, logStep, parseList, symbols } from '../src/utils'

describe('Utils', () => {
  describe('parseList', () => {
    it('should return undefined when the flag was not given', () => {
      expect(parseList(undefined)).toBeUndefined()
    })

    it('should split comma-separated values', () => {
      expect(parseList('-beta, -rc')).toEqual(['-beta', '-rc'])
    })

    it('should turn numeric values back into strings', () => {
      expect(parseList([2024, '-rc'])).toEqual(['2024', '-rc'])
    })

    it('should flatten repeated flags and drop empty entries', () => {
      expect(parseList(['-beta', '-rc,', ' -dev '])).toEqual(['-beta', '-rc', '-dev'])
    })
  })

  describe('escapeRegExp', () => {
    it('should escape regex metacharacters', () => {
      expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c')
    })
  })

  describe('logStep', () => {
    it('should prefix dry runs', () => {
      const lines: string[] = []
      logStep(symbols.info, 'Rendering', true, line => lines.push(line))

      expect(lines).toEqual([`${symbols.info} [DRY RUN] Rendering`])
    })
  })

  describe('colors', () => {
    it('should wrap text in ANSI codes', () => {
      expect(colors.red('x')).toBe('\x1B[31mx\x1B[0m')
    })
  })
})
