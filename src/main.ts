#!/usr/bin/env node
import { cubic, line, quadratic, Segment, segmentPoints } from './bezier/core'
import { calcCubicBounds, calcQuadraticBounds } from './bezier/helpers'
import { solveCubic, solveQuadratic } from './bezier/math'
import { splitSegment } from './bezier/split'
import { PreconditionError } from './errors'
import { Axis, Bounds, Point } from './types/base'
import { boundsToTuple } from './utils/bounds'

const USAGE = 'Usage: bezier-bounds <bounds|split|solve> [--axis x|y] [--where n] <x,y|n> ...'

interface CommandOptions {
  axis: Axis
  where?: number
  // Flags given on the command line, in order.
  given: string[]
}

function parseNumber(text: string): number {
  const value = Number(text)
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw new PreconditionError(`Invalid number: ${text}`)
  }
  return value
}

function parsePoint(text: string): Point {
  const parts = text.split(',')
  if (parts.length !== 2) {
    throw new PreconditionError(`Invalid point: ${text}`)
  }
  return { x: parseNumber(parts[0]), y: parseNumber(parts[1]) }
}

function formatPoint(p: Point): string {
  return `${p.x},${p.y}`
}

function formatBounds(bounds: Bounds): string {
  return boundsToTuple(bounds).join(' ')
}

function parseAxis(text: string): Axis {
  switch (text) {
    case Axis.X:
      return Axis.X
    case Axis.Y:
      return Axis.Y
    default:
      throw new PreconditionError(`Invalid axis: ${text}`)
  }
}

// Pull `--axis` and `--where` out of the argument list; the rest are operands.
function parseOptions(args: string[]): { options: CommandOptions; operands: string[] } {
  const options: CommandOptions = { axis: Axis.Y, given: [] }
  const operands: string[] = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--axis' || arg === '--where') {
      const value = args[i + 1]
      if (value === undefined) {
        throw new PreconditionError(`Missing value for ${arg}`)
      }
      options.given.push(arg)
      if (arg === '--axis') {
        options.axis = parseAxis(value)
      } else {
        options.where = parseNumber(value)
      }
      i++
    } else if (arg.startsWith('--')) {
      throw new PreconditionError(`Unknown flag: ${arg}`)
    } else {
      operands.push(arg)
    }
  }

  return { options, operands }
}

function toSegment(points: Point[]): Segment {
  switch (points.length) {
    case 2:
      return line({ start: points[0], end: points[1] })
    case 3:
      return quadratic({ start: points[0], control: points[1], end: points[2] })
    case 4:
      return cubic({
        start: points[0],
        control1: points[1],
        control2: points[2],
        end: points[3]
      })
    default:
      throw new PreconditionError(`Expected 2 to 4 points, got ${points.length}`)
  }
}

function rejectOptions(command: string, options: CommandOptions): void {
  if (options.given.length > 0) {
    throw new PreconditionError(`${command} does not take ${options.given.join(', ')}`)
  }
}

// Runs one command and returns the lines it would print.
export function runCommand(args: string[]): string[] {
  const [command, ...rest] = args
  const { options, operands } = parseOptions(rest)

  switch (command) {
    case 'bounds': {
      rejectOptions(command, options)
      const points = operands.map(parsePoint)
      if (points.length === 3) {
        return [formatBounds(calcQuadraticBounds(points[0], points[1], points[2]))]
      }
      if (points.length === 4) {
        return [formatBounds(calcCubicBounds(points[0], points[1], points[2], points[3]))]
      }
      throw new PreconditionError(`bounds takes 3 or 4 points, got ${points.length}`)
    }
    case 'split': {
      if (options.where === undefined) {
        throw new PreconditionError('split requires --where')
      }
      const segment = toSegment(operands.map(parsePoint))
      return splitSegment(segment, options.where, options.axis).map((piece) =>
        segmentPoints(piece).map(formatPoint).join(' ')
      )
    }
    case 'solve': {
      rejectOptions(command, options)
      const coefficients = operands.map(parseNumber)
      if (coefficients.length === 3) {
        const [a, b, c] = coefficients
        return solveQuadratic(a, b, c).map(String)
      }
      if (coefficients.length === 4) {
        const [a, b, c, d] = coefficients
        return solveCubic(a, b, c, d).map(String)
      }
      throw new PreconditionError(`solve takes 3 or 4 coefficients, got ${coefficients.length}`)
    }
    default:
      throw new PreconditionError(`Unknown command: ${command ?? '(none)'}`)
  }
}

export function main(args: string[] = process.argv.slice(2)): void {
  if (args.length < 1) {
    console.log(USAGE)
    console.log('Example: bezier-bounds bounds 0,0 50,100 100,0')
    process.exitCode = 1
    return
  }

  try {
    for (const output of runCommand(args)) {
      console.log(output)
    }
  } catch (error) {
    console.error('bezier-bounds failed:', error instanceof Error ? error.message : error)
    if (error instanceof PreconditionError) {
      console.error(USAGE)
    }
    process.exitCode = 1
  }
}

// Run the main function if this file is executed directly.
if (require.main === module) {
  main()
}
