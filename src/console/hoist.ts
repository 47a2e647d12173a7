/**
 * Top-level binding hoisting for lines that use `await`.
 *
 * Such lines run inside an async function, so their declarations would die
 * with it. Each top-level declaration is followed by assignments onto the
 * context global, which keeps the bindings visible to later lines:
 *
 * - `const t = await page.title()` → `const t = await page.title(); globalThis.t = t;`
 * - `async function go() {}` → `async function go() {}; globalThis.go = go;`
 *
 * Nested declarations (blocks, loops, functions) are left alone.
 */

import * as acorn from "acorn";

interface Insertion {
  at: number;
  text: string;
}

export function hoistTopLevelBindings(source: string): { code: string; names: string[] } {
  let program: acorn.Program;
  try {
    program = acorn.parse(source, {
      ecmaVersion: "latest",
      sourceType: "script",
      allowAwaitOutsideFunction: true,
    });
  } catch {
    // Leave the source untouched: compiling it reports the syntax error.
    return { code: source, names: [] };
  }

  const names: string[] = [];
  const insertions: Insertion[] = [];

  for (const node of program.body) {
    const declared = declaredNames(node);
    if (declared.length === 0) continue;
    names.push(...declared);
    insertions.push({
      at: node.end,
      // Leading `;` closes declarations written without one.
      text: "; " + declared.map((name) => `globalThis.${name} = ${name};`).join(" "),
    });
  }

  if (insertions.length === 0) return { code: source, names };

  const segments: string[] = [];
  let lastIndex = 0;
  for (const { at, text } of insertions) {
    segments.push(source.slice(lastIndex, at), text);
    lastIndex = at;
  }
  segments.push(source.slice(lastIndex));

  return { code: segments.join(""), names };
}

function declaredNames(node: acorn.Statement | acorn.ModuleDeclaration): string[] {
  switch (node.type) {
    case "VariableDeclaration": {
      const names: string[] = [];
      for (const declarator of node.declarations) {
        collectPatternNames(declarator.id, names);
      }
      return names;
    }
    case "FunctionDeclaration":
    case "ClassDeclaration":
      return [node.id.name];
    default:
      return [];
  }
}

function collectPatternNames(pattern: acorn.Pattern, names: string[]): void {
  switch (pattern.type) {
    case "Identifier":
      names.push(pattern.name);
      break;
    case "ObjectPattern":
      for (const prop of pattern.properties) {
        collectPatternNames(prop.type === "RestElement" ? prop.argument : prop.value, names);
      }
      break;
    case "ArrayPattern":
      for (const element of pattern.elements) {
        if (element) collectPatternNames(element, names);
      }
      break;
    case "RestElement":
      collectPatternNames(pattern.argument, names);
      break;
    case "AssignmentPattern":
      collectPatternNames(pattern.left, names);
      break;
  }
}
