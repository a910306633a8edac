import { createSemantics } from "../common/operators.js";

/** Offside spellings of the shared operators. */
export const semantics = createSemantics(
  {
    "+": "+",
    "-": "-",
    "*": "*",
    "/": "/",
    "%": "%",
    "^": "pow",
    "==": "==",
    "!=": "!=",
    "<": "<",
    ">": ">",
    "<=": "<=",
    ">=": ">=",
  },
  { "-": "neg", not: "not" }
);
