/**
 * Cell rewriting for the persistent namespace.
 *
 * Top-level `var`/`let`/`const`/`class` declarations become assignments on the
 * context global and top-level functions are copied onto it. Bindings then
 * outlive the cell, survive the async wrapper used for top-level await, and
 * can be declared again by a later cell.
 */

import { parse, type Program, type VariableDeclaration } from 'acorn';

interface Edit {
  start: number;
  end: number;
  text: string;
}

function rewriteVariables(code: string, node: VariableDeclaration): string {
  const assignments = node.declarations.map((declarator) => {
    const target = code.slice(declarator.id.start, declarator.id.end);
    if (declarator.init) {
      return `(${target} = ${code.slice(declarator.init.start, declarator.init.end)})`;
    }
    // `var x;` keeps a value an earlier cell bound
    if (node.kind === 'var') {
      return `(${target} = globalThis.${target})`;
    }
    return `(${target} = undefined)`;
  });
  // Leading `;` keeps the parenthesis from joining a previous line without one
  return `;${assignments.join(', ')};`;
}

function parseCell(code: string): Program | null {
  try {
    return parse(code, {
      ecmaVersion: 'latest',
      sourceType: 'script',
      allowAwaitOutsideFunction: true,
    });
  } catch (error) {
    // vm compiles the original text and reports the syntax error itself
    if (error instanceof SyntaxError) return null;
    throw error;
  }
}

/** The cell with its top-level declarations turned into global assignments. */
export function rewriteCell(code: string): string {
  const program = parseCell(code);
  if (!program) return code;

  const edits: Edit[] = [];
  const hoisted: string[] = [];

  for (const node of program.body) {
    if (node.type === 'VariableDeclaration') {
      edits.push({ start: node.start, end: node.end, text: rewriteVariables(code, node) });
    } else if (node.type === 'ClassDeclaration') {
      const name = node.id.name;
      edits.push({
        start: node.start,
        end: node.end,
        text: `;${name} = ${code.slice(node.start, node.end)};`,
      });
    } else if (node.type === 'FunctionDeclaration') {
      // Declarations are hoisted, so the copy can run before anything else
      hoisted.push(`globalThis.${node.id.name} = ${node.id.name};`);
    }
  }

  if (edits.length === 0 && hoisted.length === 0) return code;

  let rewritten = code;
  for (const edit of edits.sort((a, b) => b.start - a.start)) {
    rewritten = rewritten.slice(0, edit.start) + edit.text + rewritten.slice(edit.end);
  }
  return hoisted.join(' ') + rewritten;
}
