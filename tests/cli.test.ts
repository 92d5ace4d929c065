import { afterEach, describe, expect, it, jest } from '@jest/globals'
import { PreconditionError } from '../src/errors'
import { main, runCommand } from '../src/main'

describe('Command line', () => {
  it('should print quadratic bounds', () => {
    expect(runCommand(['bounds', '0,0', '50,100', '100,0'])).toEqual(['0 0 100 50'])
  })

  it('should print cubic bounds', () => {
    expect(runCommand(['bounds', '0,0', '25,100', '75,100', '100,0'])).toEqual(['0 0 100 75'])
  })

  it('should split a line on y by default', () => {
    expect(runCommand(['split', '--where', '50', '0,0', '100,100'])).toEqual([
      '0,0 50,50',
      '50,50 100,100'
    ])
  })

  it('should split a quadratic on the requested axis', () => {
    expect(runCommand(['split', '--axis', 'x', '--where', '50', '0,0', '50,100', '100,0'])).toEqual(
      ['0,0 25,50 50,50', '50,50 75,50 100,0']
    )
  })

  it('should print the roots of a quadratic', () => {
    expect(runCommand(['solve', '1', '0', '-4'])).toEqual(['2', '-2'])
  })

  it('should print nothing for a cubic without real roots in reach', () => {
    expect(runCommand(['solve', '0', '0', '0', '5'])).toEqual([])
  })

  it('should be barked at for bad input', () => {
    expect(() => runCommand(['bounds', '0,0'])).toThrow('bounds takes 3 or 4 points, got 1')
    expect(() => runCommand(['bounds', '0,0', 'a,1', '2,2'])).toThrow('Invalid number: a')
    expect(() => runCommand(['bounds', '0;0', '1,1', '2,2'])).toThrow('Invalid point: 0;0')
    expect(() => runCommand(['split', '0,0', '1,1'])).toThrow('split requires --where')
    expect(() => runCommand(['split', '--axis', 'z', '--where', '1', '0,0', '1,1'])).toThrow(
      'Invalid axis: z'
    )
    expect(() => runCommand(['split', '--where'])).toThrow('Missing value for --where')
    expect(() => runCommand(['frobnicate'])).toThrow(PreconditionError)
  })

  it('should refuse split options on bounds and solve', () => {
    expect(() =>
      runCommand(['bounds', '--axis', 'x', '--where', '999', '0,0', '50,100', '100,0'])
    ).toThrow('bounds does not take --axis, --where')
    expect(() => runCommand(['solve', '--where', '7', '1', '0', '-4'])).toThrow(
      'solve does not take --where'
    )
    expect(() => runCommand(['solve', '--where', '7', '1', '0', '-4'])).toThrow(PreconditionError)
  })
})

describe('Command line entry point', () => {
  afterEach(() => {
    jest.restoreAllMocks()
    process.exitCode = undefined
  })

  it('should print the results', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {})

    main(['solve', '1', '0', '-4'])

    expect(log.mock.calls).toEqual([['2'], ['-2']])
    expect(process.exitCode).toBeUndefined()
  })

  it('should print usage and fail without arguments', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {})

    main([])

    expect(log).toHaveBeenCalledWith(
      'Usage: bezier-bounds <bounds|split|solve> [--axis x|y] [--where n] <x,y|n> ...'
    )
    expect(process.exitCode).toBe(1)
  })

  it('should report bad input with usage and fail', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {})
    const error = jest.spyOn(console, 'error').mockImplementation(() => {})

    main(['bounds', '0,0'])

    expect(log).not.toHaveBeenCalled()
    expect(error.mock.calls).toEqual([
      ['bezier-bounds failed:', 'bounds takes 3 or 4 points, got 1'],
      ['Usage: bezier-bounds <bounds|split|solve> [--axis x|y] [--where n] <x,y|n> ...']
    ])
    expect(process.exitCode).toBe(1)
  })
})
