/**
 * Purpose: Parse ThemeScript chunks and expressions into AST nodes.
 * Intent: Implement the grammar and operator precedence without runtime code generation.
 */

import type { AssignTarget, BinaryOp, Block, Expr, FunctionBody, Stmt, TableField } from "./ast.js";
import { type Keyword, type Punct, ThemeScriptSyntaxError, type Token, Tokenizer } from "./tokenizer.js";
import { fromByteString } from "./values.js";

// Whether each enclosing function (innermost last) accepts `...`; chunks do.
const varargScopes: boolean[] = [];

function inFunctionScope<T>(isVararg: boolean, parse: () => T): T {
  varargScopes.push(isVararg);
  try {
    return parse();
  } finally {
    varargScopes.pop();
  }
}

function tokenToString(tok: Token): string {
  switch (tok.type) {
    case "eof":
      return "<eof>";
    case "punct":
    case "keyword":
      return `'${tok.value}'`;
    case "name":
      return `'${tok.value}'`;
    case "number":
      return `number ${tok.value}`;
    case "string":
      return `string ${JSON.stringify(fromByteString(tok.value))}`;
    default: {
      const _exhaustive: never = tok;
      return String(_exhaustive);
    }
  }
}

function isPunct(tok: Token, value: Punct): boolean {
  return tok.type === "punct" && tok.value === value;
}

function isKeyword(tok: Token, value: Keyword): boolean {
  return tok.type === "keyword" && tok.value === value;
}

function expectPunct(t: Tokenizer, value: Punct, context: string): Token {
  const tok = t.next();
  if (!isPunct(tok, value)) {
    throw new ThemeScriptSyntaxError(`'${value}' expected ${context} near ${tokenToString(tok)}`, tok.pos);
  }
  return tok;
}

function expectKeyword(t: Tokenizer, value: Keyword, context: string): Token {
  const tok = t.next();
  if (!isKeyword(tok, value)) {
    throw new ThemeScriptSyntaxError(`'${value}' expected ${context} near ${tokenToString(tok)}`, tok.pos);
  }
  return tok;
}

function expectName(t: Tokenizer): string {
  const tok = t.next();
  if (tok.type !== "name") throw new ThemeScriptSyntaxError(`<name> expected near ${tokenToString(tok)}`, tok.pos);
  return tok.value;
}

/** Binary operators by precedence, lowest first. `..` and `^` associate to the right. */
const BINARY_LEVELS: { ops: BinaryOp[]; right: boolean }[] = [
  { ops: ["or"], right: false },
  { ops: ["and"], right: false },
  { ops: ["<", ">", "<=", ">=", "~=", "=="], right: false },
  { ops: ["|"], right: false },
  { ops: ["~"], right: false },
  { ops: ["&"], right: false },
  { ops: ["<<", ">>"], right: false },
  { ops: [".."], right: true },
  { ops: ["+", "-"], right: false },
  { ops: ["*", "/", "//", "%"], right: false },
];

function binaryOpOf(tok: Token, level: { ops: BinaryOp[] }): BinaryOp | null {
  if (tok.type !== "punct" && tok.type !== "keyword") return null;
  for (const op of level.ops) {
    if (op === tok.value) return op;
  }
  return null;
}

function parseBinary(t: Tokenizer, levelIndex: number): Expr {
  const level = BINARY_LEVELS[levelIndex];
  if (!level) return parseUnary(t);

  let left = parseBinary(t, levelIndex + 1);
  while (true) {
    const tok = t.peek();
    const op = binaryOpOf(tok, level);
    if (!op) return left;
    t.next();
    const right = level.right ? parseBinary(t, levelIndex) : parseBinary(t, levelIndex + 1);
    left = { kind: "binary", op, left, right, pos: tok.pos };
  }
}

export function parseExpr(t: Tokenizer): Expr {
  return parseBinary(t, 0);
}

function parseUnary(t: Tokenizer): Expr {
  const tok = t.peek();
  if (isKeyword(tok, "not")) {
    t.next();
    return { kind: "unary", op: "not", expr: parseUnary(t), pos: tok.pos };
  }
  if (tok.type === "punct" && (tok.value === "-" || tok.value === "#" || tok.value === "~")) {
    t.next();
    return { kind: "unary", op: tok.value, expr: parseUnary(t), pos: tok.pos };
  }
  return parsePower(t);
}

function parsePower(t: Tokenizer): Expr {
  const base = parseSimple(t);
  const tok = t.peek();
  if (isPunct(tok, "^")) {
    t.next();
    // -x^2 is -(x^2), and x^-y is allowed
    const exponent = parseUnary(t);
    return { kind: "binary", op: "^", left: base, right: exponent, pos: tok.pos };
  }
  return base;
}

function parseSimple(t: Tokenizer): Expr {
  const tok = t.peek();
  if (tok.type === "number") {
    t.next();
    return { kind: "number", value: tok.value };
  }
  if (tok.type === "string") {
    t.next();
    return { kind: "string", value: tok.value };
  }
  if (isKeyword(tok, "nil")) {
    t.next();
    return { kind: "nil" };
  }
  if (isKeyword(tok, "true") || isKeyword(tok, "false")) {
    t.next();
    return { kind: "boolean", value: isKeyword(tok, "true") };
  }
  if (isKeyword(tok, "function")) {
    t.next();
    return { kind: "function", fn: parseFunctionBody(t, "anonymous", false) };
  }
  if (isPunct(tok, "{")) return parseTable(t);
  if (isPunct(tok, "...")) {
    t.next();
    if (varargScopes[varargScopes.length - 1] !== true) {
      throw new ThemeScriptSyntaxError("cannot use '...' outside a vararg function near '...'", tok.pos);
    }
    return { kind: "vararg", pos: tok.pos };
  }
  return parseSuffixed(t);
}

function parsePrimary(t: Tokenizer): Expr {
  const tok = t.next();
  if (tok.type === "name") return { kind: "identifier", name: tok.value, pos: tok.pos };
  if (isPunct(tok, "(")) {
    // Parentheses cut a multi-valued expression down to its first value.
    const expr = parseExpr(t);
    expectPunct(t, ")", "to close '('");
    return { kind: "paren", expr, pos: tok.pos };
  }
  throw new ThemeScriptSyntaxError(`unexpected symbol near ${tokenToString(tok)}`, tok.pos);
}

function parseCallArgs(t: Tokenizer): Expr[] {
  const tok = t.peek();
  if (tok.type === "string") {
    t.next();
    return [{ kind: "string", value: tok.value }];
  }
  if (isPunct(tok, "{")) return [parseTable(t)];

  expectPunct(t, "(", "for function arguments");
  const args: Expr[] = [];
  if (isPunct(t.peek(), ")")) {
    t.next();
    return args;
  }
  while (true) {
    args.push(parseExpr(t));
    if (isPunct(t.peek(), ",")) {
      t.next();
      continue;
    }
    break;
  }
  expectPunct(t, ")", "to close function arguments");
  return args;
}

function isCallStart(tok: Token): boolean {
  return isPunct(tok, "(") || isPunct(tok, "{") || tok.type === "string";
}

function parseSuffixed(t: Tokenizer): Expr {
  let expr = parsePrimary(t);
  while (true) {
    const tok = t.peek();
    if (isPunct(tok, ".")) {
      t.next();
      const name = expectName(t);
      expr = { kind: "index", object: expr, key: { kind: "string", value: name }, pos: tok.pos };
      continue;
    }
    if (isPunct(tok, "[")) {
      t.next();
      const key = parseExpr(t);
      expectPunct(t, "]", "to close index");
      expr = { kind: "index", object: expr, key, pos: tok.pos };
      continue;
    }
    if (isPunct(tok, ":")) {
      t.next();
      const name = expectName(t);
      const args = parseCallArgs(t);
      expr = { kind: "method", object: expr, name, args, pos: tok.pos };
      continue;
    }
    if (isCallStart(tok)) {
      expr = { kind: "call", callee: expr, args: parseCallArgs(t), pos: tok.pos };
      continue;
    }
    return expr;
  }
}

function parseTable(t: Tokenizer): Expr {
  const open = expectPunct(t, "{", "to open table");
  const fields: TableField[] = [];

  while (!isPunct(t.peek(), "}")) {
    const tok = t.peek();
    if (isPunct(tok, "[")) {
      t.next();
      const key = parseExpr(t);
      expectPunct(t, "]", "to close table key");
      expectPunct(t, "=", "after table key");
      fields.push({ kind: "keyed", key, value: parseExpr(t) });
    } else if (tok.type === "name" && isPunct(t.peek(1), "=")) {
      t.next();
      t.next();
      fields.push({ kind: "named", key: tok.value, value: parseExpr(t) });
    } else {
      fields.push({ kind: "positional", value: parseExpr(t) });
    }

    const sep = t.peek();
    if (isPunct(sep, ",") || isPunct(sep, ";")) {
      t.next();
      continue;
    }
    if (!isPunct(sep, "}")) {
      throw new ThemeScriptSyntaxError(`'}' expected to close table near ${tokenToString(sep)}`, sep.pos);
    }
  }
  t.next();
  return { kind: "table", fields, pos: open.pos };
}

function parseFunctionBody(t: Tokenizer, name: string, isMethod: boolean): FunctionBody {
  expectPunct(t, "(", "to open parameter list");
  const params: string[] = isMethod ? ["self"] : [];
  let isVararg = false;
  if (!isPunct(t.peek(), ")")) {
    while (true) {
      if (isPunct(t.peek(), "...")) {
        t.next();
        isVararg = true;
        break;
      }
      params.push(expectName(t));
      if (isPunct(t.peek(), ",")) {
        t.next();
        continue;
      }
      break;
    }
  }
  expectPunct(t, ")", "to close parameter list");
  const body = inFunctionScope(isVararg, () => parseBlock(t));
  expectKeyword(t, "end", `to close function '${name}'`);
  return { params, isVararg, body, name };
}

function parseExprList(t: Tokenizer): Expr[] {
  const out = [parseExpr(t)];
  while (isPunct(t.peek(), ",")) {
    t.next();
    out.push(parseExpr(t));
  }
  return out;
}

function isBlockEnd(tok: Token): boolean {
  return (
    tok.type === "eof" ||
    isKeyword(tok, "end") ||
    isKeyword(tok, "else") ||
    isKeyword(tok, "elseif") ||
    isKeyword(tok, "until")
  );
}

function asAssignTarget(expr: Expr, pos: number): AssignTarget {
  if (expr.kind === "identifier" || expr.kind === "index") return expr;
  throw new ThemeScriptSyntaxError("syntax error: cannot assign to this expression", pos);
}

function parseFunctionStatement(t: Tokenizer, pos: number): Stmt {
  const firstPos = t.peek().pos;
  const first = expectName(t);
  let target: AssignTarget = { kind: "identifier", name: first, pos: firstPos };
  let fullName = first;
  let isMethod = false;

  while (isPunct(t.peek(), ".") || isPunct(t.peek(), ":")) {
    const sep = t.next();
    const name = expectName(t);
    target = { kind: "index", object: target, key: { kind: "string", value: name }, pos: sep.pos };
    fullName += `${isPunct(sep, ":") ? ":" : "."}${name}`;
    if (isPunct(sep, ":")) {
      isMethod = true;
      break;
    }
  }

  const fn = parseFunctionBody(t, fullName, isMethod);
  return { kind: "assign", targets: [target], values: [{ kind: "function", fn }], pos };
}

function parseFor(t: Tokenizer, pos: number): Stmt {
  const first = expectName(t);
  if (isPunct(t.peek(), "=")) {
    t.next();
    const start = parseExpr(t);
    expectPunct(t, ",", "in numeric for");
    const limit = parseExpr(t);
    let step: Expr | null = null;
    if (isPunct(t.peek(), ",")) {
      t.next();
      step = parseExpr(t);
    }
    expectKeyword(t, "do", "in numeric for");
    const body = parseBlock(t);
    expectKeyword(t, "end", "to close 'for'");
    return { kind: "numericFor", name: first, start, limit, step, body, pos };
  }

  const names = [first];
  while (isPunct(t.peek(), ",")) {
    t.next();
    names.push(expectName(t));
  }
  expectKeyword(t, "in", "in generic for");
  const iterators = parseExprList(t);
  expectKeyword(t, "do", "in generic for");
  const body = parseBlock(t);
  expectKeyword(t, "end", "to close 'for'");
  return { kind: "genericFor", names, iterators, body, pos };
}

function parseIf(t: Tokenizer, pos: number): Stmt {
  const clauses: { test: Expr; body: Block }[] = [];
  let orElse: Block | null = null;

  const test = parseExpr(t);
  expectKeyword(t, "then", "after 'if' condition");
  clauses.push({ test, body: parseBlock(t) });

  while (true) {
    const tok = t.next();
    if (isKeyword(tok, "elseif")) {
      const elseTest = parseExpr(t);
      expectKeyword(t, "then", "after 'elseif' condition");
      clauses.push({ test: elseTest, body: parseBlock(t) });
      continue;
    }
    if (isKeyword(tok, "else")) {
      orElse = parseBlock(t);
      expectKeyword(t, "end", "to close 'if'");
      break;
    }
    if (isKeyword(tok, "end")) break;
    throw new ThemeScriptSyntaxError(`'end' expected to close 'if' near ${tokenToString(tok)}`, tok.pos);
  }

  return { kind: "if", clauses, orElse, pos };
}

function parseStatement(t: Tokenizer): Stmt | null {
  const tok = t.peek();
  const pos = tok.pos;

  if (isPunct(tok, ";")) {
    t.next();
    return null;
  }

  if (tok.type === "keyword") {
    switch (tok.value) {
      case "local": {
        t.next();
        if (isKeyword(t.peek(), "function")) {
          t.next();
          const name = expectName(t);
          return { kind: "localFunction", name, fn: parseFunctionBody(t, name, false), pos };
        }
        const names = [expectName(t)];
        while (isPunct(t.peek(), ",")) {
          t.next();
          names.push(expectName(t));
        }
        let values: Expr[] = [];
        if (isPunct(t.peek(), "=")) {
          t.next();
          values = parseExprList(t);
        }
        return { kind: "local", names, values, pos };
      }
      case "function":
        t.next();
        return parseFunctionStatement(t, pos);
      case "do": {
        t.next();
        const body = parseBlock(t);
        expectKeyword(t, "end", "to close 'do'");
        return { kind: "do", body, pos };
      }
      case "while": {
        t.next();
        const test = parseExpr(t);
        expectKeyword(t, "do", "after 'while' condition");
        const body = parseBlock(t);
        expectKeyword(t, "end", "to close 'while'");
        return { kind: "while", test, body, pos };
      }
      case "repeat": {
        t.next();
        const body = parseBlock(t);
        expectKeyword(t, "until", "to close 'repeat'");
        return { kind: "repeat", body, test: parseExpr(t), pos };
      }
      case "if":
        t.next();
        return parseIf(t, pos);
      case "for":
        t.next();
        return parseFor(t, pos);
      case "return": {
        t.next();
        const next = t.peek();
        const values = isBlockEnd(next) || isPunct(next, ";") ? [] : parseExprList(t);
        if (isPunct(t.peek(), ";")) t.next();
        if (!isBlockEnd(t.peek())) {
          throw new ThemeScriptSyntaxError(`<eof> expected near ${tokenToString(t.peek())}`, t.peek().pos);
        }
        return { kind: "return", values, pos };
      }
      case "break":
        t.next();
        return { kind: "break", pos };
      default:
        break;
    }
  }

  const expr = parseSuffixed(t);
  if (expr.kind === "call" || expr.kind === "method") {
    if (!isPunct(t.peek(), "=") && !isPunct(t.peek(), ",")) return { kind: "call", expr, pos };
  }

  const targets = [asAssignTarget(expr, pos)];
  while (isPunct(t.peek(), ",")) {
    t.next();
    const next = t.peek();
    targets.push(asAssignTarget(parseSuffixed(t), next.pos));
  }
  expectPunct(t, "=", "in assignment");
  return { kind: "assign", targets, values: parseExprList(t), pos };
}

export function parseBlock(t: Tokenizer): Block {
  const block: Block = [];
  while (!isBlockEnd(t.peek())) {
    const stmt = parseStatement(t);
    if (stmt) block.push(stmt);
    if (stmt?.kind === "return") break;
  }
  return block;
}

export function parseChunk(src: string): Block {
  const t = new Tokenizer(src);
  const block = inFunctionScope(true, () => parseBlock(t));
  const tail = t.peek();
  if (tail.type !== "eof") throw new ThemeScriptSyntaxError(`<eof> expected near ${tokenToString(tail)}`, tail.pos);
  return block;
}

/** Parse `src` as a single expression, or return null when it is not exactly one. */
export function tryParseExpression(src: string): Expr | null {
  try {
    const t = new Tokenizer(src);
    const expr = inFunctionScope(true, () => parseExpr(t));
    return t.peek().type === "eof" ? expr : null;
  } catch (err) {
    if (err instanceof ThemeScriptSyntaxError) return null;
    throw err;
  }
}
