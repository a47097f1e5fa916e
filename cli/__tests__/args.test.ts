import { describe, it, expect } from 'vitest'
import { parseArgs, UsageError } from '../lib/args.js'

describe('parseArgs', () => {
  it('should default to play with no arguments', () => {
    expect(parseArgs([])).toEqual({ command: 'play', braille: false })
  })

  it('should read an animation name as play shorthand', () => {
    expect(parseArgs(['pulse'])).toEqual({ command: 'play', animation: 'pulse', braille: false })
  })

  it('should read commands and their target', () => {
    expect(parseArgs(['export', 'wave'])).toMatchObject({ command: 'export', animation: 'wave' })
    expect(parseArgs(['show', 'frame.txt'])).toMatchObject({ command: 'show', path: 'frame.txt' })
    expect(parseArgs(['list'])).toMatchObject({ command: 'list' })
  })

  it('should accept flags in both forms', () => {
    const options = parseArgs(['play', 'pulse', '--frames', '12', '--fps=20', '--size', '4.5', '--braille'])
    expect(options).toEqual({
      command: 'play',
      animation: 'pulse',
      frames: 12,
      fps: 20,
      size: 4.5,
      braille: true,
    })
  })

  it('should take a config path', () => {
    expect(parseArgs(['--config', './my.yml']).config).toBe('./my.yml')
    expect(parseArgs(['--config=~/m.yml']).config).toBe('~/m.yml')
  })

  it('should return help for -h and --help', () => {
    expect(parseArgs(['export', 'wave', '--help']).command).toBe('help')
    expect(parseArgs(['-h']).command).toBe('help')
  })

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--loud'])).toThrow(UsageError)
    expect(() => parseArgs(['--loud'])).toThrow('Unknown option --loud')
  })

  it('should reject non-integer counts', () => {
    expect(() => parseArgs(['--frames', 'many'])).toThrow('--frames expects an integer, got "many"')
    expect(() => parseArgs(['--fps', '2.5'])).toThrow('--fps expects an integer, got "2.5"')
  })

  it('should reject a flag with no value', () => {
    expect(() => parseArgs(['--brightness'])).toThrow('--brightness needs a value')
    expect(() => parseArgs(['--frames', '--braille'])).toThrow('--frames needs a value')
  })

  it('should reject unknown animations', () => {
    expect(() => parseArgs(['sparkle'])).toThrow('Unknown animation "sparkle"')
    expect(() => parseArgs(['export', 'sparkle'])).toThrow('Unknown animation "sparkle"')
  })

  it('should require a target for export and show', () => {
    expect(() => parseArgs(['export'])).toThrow('export needs an animation name')
    expect(() => parseArgs(['show'])).toThrow('show needs a file path')
  })

  it('should reject counts below 1', () => {
    expect(() => parseArgs(['--frames', '0'])).toThrow('--frames must be at least 1')
    expect(() => parseArgs(['--fps=0'])).toThrow('--fps must be at least 1')
  })

  it('should reject extra positionals', () => {
    expect(() => parseArgs(['export', 'wave', 'pulse'])).toThrow('Unexpected argument "pulse"')
    expect(() => parseArgs(['list', 'wave'])).toThrow('Unexpected argument "wave"')
  })

  it('should hand back the animation name for play and export', () => {
    const options = parseArgs(['export', 'horizontalWave'])
    expect(options.command === 'export' ? options.animation : undefined).toBe('horizontalWave')
  })
})
