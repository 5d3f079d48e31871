/**
 * Source rewriting that routes a module's callables through the runtime
 * wrappers before any of its code runs.
 *
 * Only top-level definitions are rewritten:
 *   - function declarations are re-bound in a prologue (they are hoisted,
 *     so the prologue runs before any other statement can call them);
 *   - `const/let/var` bindings initialised with a function or arrow
 *     expression get the initializer wrapped in place;
 *   - class declarations are followed by a `wrapClass` call that replaces
 *     their prototype and static methods.
 *
 * Every insertion stays on an existing line, so line numbers in stack
 * traces and recorded metadata match the file on disk.
 */

import { ts } from 'ts-morph';
import * as path from 'path';
import { describeSignature, memberKey } from './signature.js';
import { moduleName } from './selector.js';
import type { InstrumentedMeta } from '../runtime.js';
import { InstrumentationError } from '../errors.js';

export const RUNTIME_BINDING = '__calltrace';

export interface InstrumentOptions {
  filename: string;
  projectRoot: string;
  /** Import specifier of the runtime module */
  runtimeSpecifier: string;
}

export interface InstrumentResult {
  code: string;
  /** Qualified names of every wrapped definition, in source order */
  wrapped: string[];
}

interface Insertion {
  pos: number;
  text: string;
  order: number;
}

function scriptKindFor(filename: string): ts.ScriptKind {
  switch (path.extname(filename)) {
    case '.ts':
    case '.mts':
    case '.cts':
      return ts.ScriptKind.TS;
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    default:
      return ts.ScriptKind.JS;
  }
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some((m) => m.kind === kind);
}

function syntaxErrors(source: string, filename: string): string[] {
  const { diagnostics } = ts.transpileModule(source, {
    fileName: filename,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ESNext, module: ts.ModuleKind.ESNext, allowJs: true },
  });
  return (diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => {
      const text = ts.flattenDiagnosticMessageText(d.messageText, '\n');
      if (d.file && d.start !== undefined) {
        const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
        return `${line + 1}:${character + 1} ${text}`;
      }
      return text;
    });
}

/**
 * Rewrite one ES module so its definitions are traced. Throws
 * InstrumentationError when the source does not parse.
 */
export function instrumentSource(source: string, options: InstrumentOptions): InstrumentResult {
  const { filename, projectRoot, runtimeSpecifier } = options;

  const errors = syntaxErrors(source, filename);
  if (errors.length > 0) {
    throw new InstrumentationError(
      `Cannot instrument ${filename}: ${errors.slice(0, 3).join('; ')}`,
      filename
    );
  }

  const sf = ts.createSourceFile(filename, source, ts.ScriptTarget.Latest, true, scriptKindFor(filename));
  const moduleId = moduleName(projectRoot, filename);
  const insertions: Insertion[] = [];
  const prologue: string[] = [];
  const wrapped: string[] = [];

  const lineOf = (node: ts.Node): number =>
    sf.getLineAndCharacterOfPosition(node.getStart(sf)).line + 1;

  const metaFor = (
    node: ts.SignatureDeclaration,
    qualname: string,
    sourceNode: ts.Node,
    extra: Pick<InstrumentedMeta, 'kind' | 'className'> = { kind: 'function', className: null }
  ): InstrumentedMeta => {
    const info = describeSignature(node, sf);
    wrapped.push(qualname);
    return {
      module: moduleId,
      qualname,
      filename,
      lineno: lineOf(sourceNode),
      signature: info.signature,
      annotations: info.annotations,
      defaults: info.defaults,
      source: sourceNode.getText(sf),
      kind: extra.kind,
      className: extra.className,
      params: info.params,
      isAsync: info.isAsync,
    };
  };

  for (const statement of sf.statements) {
    if (hasModifier(statement, ts.SyntaxKind.DeclareKeyword)) {
      continue;
    }

    if (ts.isFunctionDeclaration(statement) && statement.name && statement.body) {
      const name = statement.name.text;
      const meta = metaFor(statement, name, statement);
      prologue.push(`${name} = ${RUNTIME_BINDING}.wrap(${name}, ${JSON.stringify(meta)});`);
      continue;
    }

    if (ts.isVariableStatement(statement)) {
      for (const decl of statement.declarationList.declarations) {
        const init = decl.initializer;
        if (!init || !ts.isIdentifier(decl.name)) {
          continue;
        }
        if (!ts.isArrowFunction(init) && !ts.isFunctionExpression(init)) {
          continue;
        }
        const meta = metaFor(init, decl.name.text, decl);
        insertions.push({ pos: init.getStart(sf), text: `${RUNTIME_BINDING}.wrap(`, order: 0 });
        insertions.push({ pos: init.getEnd(), text: `, ${JSON.stringify(meta)})`, order: 1 });
      }
      continue;
    }

    if (ts.isClassDeclaration(statement) && statement.name) {
      const className = statement.name.text;
      const members: Record<string, InstrumentedMeta> = {};
      for (const member of statement.members) {
        if (!ts.isMethodDeclaration(member) || !member.body) {
          continue;
        }
        if (!ts.isIdentifier(member.name) && !ts.isStringLiteral(member.name)) {
          continue;
        }
        const isStatic = hasModifier(member, ts.SyntaxKind.StaticKeyword);
        const name = member.name.text;
        members[memberKey(name, isStatic)] = metaFor(member, `${className}.${name}`, member, {
          kind: isStatic ? 'staticmethod' : 'instancemethod',
          className,
        });
      }
      if (Object.keys(members).length > 0) {
        insertions.push({
          pos: statement.getEnd(),
          text: ` ${RUNTIME_BINDING}.wrapClass(${className}, ${JSON.stringify(members)});`,
          order: 2,
        });
      }
    }
  }

  if (wrapped.length === 0) {
    return { code: source, wrapped };
  }

  // A shebang must stay first; the header shares the next line
  const headerEnd = source.startsWith('#!') ? source.indexOf('\n') + 1 : 0;
  const header = [
    `import * as ${RUNTIME_BINDING} from ${JSON.stringify(runtimeSpecifier)};`,
    ...prologue,
  ].join(' ');
  insertions.push({ pos: headerEnd, text: `${header} `, order: -1 });

  let code = source;
  const ordered = [...insertions].sort((a, b) => b.pos - a.pos || b.order - a.order);
  for (const insertion of ordered) {
    code = code.slice(0, insertion.pos) + insertion.text + code.slice(insertion.pos);
  }
  return { code, wrapped };
}
