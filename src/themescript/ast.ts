/**
 * Purpose: Declare ThemeScript expression and statement nodes.
 * Intent: Keep the tree a closed union so evaluators can switch exhaustively.
 */

import type { ScriptNumber } from "./numbers.js";

export type BinaryOp =
  | "or"
  | "and"
  | "<"
  | "<="
  | ">"
  | ">="
  | "=="
  | "~="
  | "|"
  | "~"
  | "&"
  | "<<"
  | ">>"
  | ".."
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "^";

export type UnaryOp = "not" | "#" | "-" | "~";

export interface FunctionBody {
  params: string[];
  /** Declared with a trailing `...`. */
  isVararg: boolean;
  body: Block;
  name: string;
}

export type TableField =
  | { kind: "positional"; value: Expr }
  | { kind: "named"; key: string; value: Expr }
  | { kind: "keyed"; key: Expr; value: Expr };

export type Expr =
  | { kind: "nil" }
  | { kind: "boolean"; value: boolean }
  | { kind: "number"; value: ScriptNumber }
  | { kind: "string"; value: string }
  | { kind: "identifier"; name: string; pos: number }
  | { kind: "index"; object: Expr; key: Expr; pos: number }
  | { kind: "call"; callee: Expr; args: Expr[]; pos: number }
  | { kind: "method"; object: Expr; name: string; args: Expr[]; pos: number }
  | { kind: "vararg"; pos: number }
  | { kind: "paren"; expr: Expr; pos: number }
  | { kind: "function"; fn: FunctionBody }
  | { kind: "table"; fields: TableField[]; pos: number }
  | { kind: "unary"; op: UnaryOp; expr: Expr; pos: number }
  | { kind: "binary"; op: BinaryOp; left: Expr; right: Expr; pos: number };

/** Expressions that can produce several values when they end a list. */
export type MultiExpr = Extract<Expr, { kind: "call" } | { kind: "method" } | { kind: "vararg" }>;

export type AssignTarget = Extract<Expr, { kind: "identifier" } | { kind: "index" }>;

export type Stmt =
  | { kind: "local"; names: string[]; values: Expr[]; pos: number }
  | { kind: "localFunction"; name: string; fn: FunctionBody; pos: number }
  | { kind: "assign"; targets: AssignTarget[]; values: Expr[]; pos: number }
  | { kind: "call"; expr: Extract<Expr, { kind: "call" } | { kind: "method" }>; pos: number }
  | { kind: "do"; body: Block; pos: number }
  | { kind: "while"; test: Expr; body: Block; pos: number }
  | { kind: "repeat"; body: Block; test: Expr; pos: number }
  | { kind: "if"; clauses: { test: Expr; body: Block }[]; orElse: Block | null; pos: number }
  | { kind: "numericFor"; name: string; start: Expr; limit: Expr; step: Expr | null; body: Block; pos: number }
  | { kind: "genericFor"; names: string[]; iterators: Expr[]; body: Block; pos: number }
  | { kind: "return"; values: Expr[]; pos: number }
  | { kind: "break"; pos: number };

export type Block = Stmt[];
