import type { IToken, TokenType } from "chevrotain"
import { UnitParseError } from "../../Errors.js"
import { RationalNumber } from "../../Rational.js"
import { ONE, type Unit } from "../../Unit.js"
import { Caret, LParen, Minus, RParen, Slash, Star, UnitIdentifier, UnitLexer, UnitNumber, UnitPer } from "./tokens.js"

/**
 * Maps a symbol appearing in an expression to its unit. Expected to throw
 * `UnitNotFoundError` for unknown symbols.
 */
export type UnitResolver = (symbol: string) => Unit

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw this.error(undefined, "unexpected end of unit expression")
    }
    this.#index += 1
    return token
  }

  match(tokenType: TokenType): boolean {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, problem: string): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw this.error(token, problem)
    }
    this.#index += 1
    return token
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(token: IToken | undefined, problem: string): UnitParseError {
    const column = token ? token.startColumn ?? token.startOffset + 1 : this.#source.length + 1
    return parseError(this.#source, column, problem)
  }
}

const parseError = (expression: string, column: number, problem: string): UnitParseError =>
  new UnitParseError({
    expression,
    column,
    problem,
    snippet: `${expression}\n${" ".repeat(Math.max(0, column - 1))}^`,
  })

const isSquared = (token: IToken): boolean => token.image.toLowerCase() === "squared"
const isCubed = (token: IToken): boolean => token.image.toLowerCase() === "cubed"

const startsAtom = (token: IToken | undefined): boolean =>
  token !== undefined &&
  (token.tokenType === LParen || (token.tokenType === UnitIdentifier && !isSquared(token) && !isCubed(token)))

const parseProduct = (stream: Stream, resolve: UnitResolver): Unit => {
  let current = parseTerm(stream, resolve)
  while (true) {
    if (stream.match(Star)) {
      current = current.multiply(parseTerm(stream, resolve))
      continue
    }
    if (stream.match(Slash) || stream.match(UnitPer)) {
      current = current.divide(parseTerm(stream, resolve))
      continue
    }
    // Juxtaposition: `N m` is `N*m`
    if (startsAtom(stream.peek())) {
      current = current.multiply(parseTerm(stream, resolve))
      continue
    }
    break
  }
  return current
}

const parseExponent = (stream: Stream): RationalNumber => {
  const grouped = stream.match(LParen)
  const negative = stream.match(Minus)
  const token = stream.expect(UnitNumber, "expected exponent after '^'")
  let exponent = RationalNumber.approximate(Number(token.image))
  if (exponent === undefined) {
    throw stream.error(token, `exponent ${token.image} has no exact rational form`)
  }
  if (grouped) {
    if (stream.match(Slash)) {
      const denominator = stream.expect(UnitNumber, "expected denominator of fractional exponent")
      const value = Number(denominator.image)
      if (!Number.isSafeInteger(value) || value === 0) {
        throw stream.error(denominator, "denominator must be a non-zero integer")
      }
      exponent = exponent.divide(RationalNumber.fromInteger(value))
    }
    stream.expect(RParen, "expected ')' after exponent")
  }
  return negative ? exponent.negate() : exponent
}

const parseTerm = (stream: Stream, resolve: UnitResolver): Unit => {
  let base = parseAtom(stream, resolve)
  if (stream.match(Caret)) {
    base = base.pow(parseExponent(stream))
  }
  const maybePow = stream.peek()
  if (maybePow && maybePow.tokenType === UnitIdentifier) {
    if (isSquared(maybePow)) {
      stream.consume()
      base = base.pow(2)
    } else if (isCubed(maybePow)) {
      stream.consume()
      base = base.pow(3)
    }
  }
  return base
}

const parseAtom = (stream: Stream, resolve: UnitResolver): Unit => {
  if (stream.match(LParen)) {
    const inner = parseProduct(stream, resolve)
    stream.expect(RParen, "expected ')' in unit expression")
    return inner
  }
  const next = stream.peek()
  if (next && next.tokenType === UnitNumber) {
    stream.consume()
    if (next.image !== "1") {
      throw stream.error(next, "numeric factors other than 1 are not allowed")
    }
    return ONE
  }
  const token = stream.expect(UnitIdentifier, "expected unit symbol")
  return resolve(token.image)
}

/**
 * Parse expressions such as `kg*m/s^2`, `m^(1/2)`, `W per A`, `m squared`
 * or `1/s`. The empty expression is the dimensionless unit.
 *
 * Throws `UnitParseError` on malformed input; unknown symbols surface
 * whatever error `resolve` throws.
 */
export const parseUnitExpression = (text: string, resolve: UnitResolver): Unit => {
  const lexing = UnitLexer.tokenize(text)
  const [lexError] = lexing.errors
  if (lexError !== undefined) {
    throw parseError(text, lexError.column ?? lexError.offset + 1, lexError.message)
  }
  if (lexing.tokens.length === 0) {
    return ONE
  }
  const stream = new Stream(lexing.tokens, text)
  const result = parseProduct(stream, resolve)
  if (!stream.done()) {
    throw stream.error(stream.peek(), "unexpected trailing input in unit expression")
  }
  return result
}
