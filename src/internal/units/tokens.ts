import { Lexer, createToken } from "chevrotain"

/**
 * Token definitions for textual unit expressions such as `kg*m/s^2`,
 * `m^(1/2)` or `W per A`. Symbols may contain the characters used by SI
 * units (`°C`, `Ω`, `µs`, `μs`); digits only appear as numbers.
 */
export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

export const UnitIdentifier = createToken({
  name: "UnitIdentifier",
  pattern: /%|[A-Za-z°µμΩ][A-Za-z°µμΩ_]*/,
})

export const UnitPer = createToken({ name: "UnitPer", pattern: /per/, longer_alt: UnitIdentifier })

export const UnitNumber = createToken({ name: "UnitNumber", pattern: /\d+(?:\.\d+)?/ })

export const Star = createToken({ name: "Star", pattern: /\*|·/ })

export const Slash = createToken({ name: "Slash", pattern: /\// })

export const Caret = createToken({ name: "Caret", pattern: /\^/ })

export const Minus = createToken({ name: "Minus", pattern: /-/ })

export const LParen = createToken({ name: "LParen", pattern: /\(/ })

export const RParen = createToken({ name: "RParen", pattern: /\)/ })

export const UnitTokens = [WhiteSpace, UnitPer, UnitIdentifier, UnitNumber, Star, Slash, Caret, Minus, LParen, RParen]

export const UnitLexer = new Lexer(UnitTokens)
