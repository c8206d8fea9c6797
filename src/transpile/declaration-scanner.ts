import * as ts from 'typescript';
import {
  DuplicateDeclarationError,
  UnsupportedConstructError,
  UnsupportedExpressionError,
  formatLocation,
} from '../errors';
import { logger } from '../logger';
import type { Declaration, DeclarationSet, MountPoint, WorkflowParameter } from '../types/ir';
import { ParsedScript, calleeName, locationOf, readLiteral, toKebabCase } from './source';

export const MOUNT_POINT_CONSTRUCTOR = 'mountPoint';
export const PARAMETER_CONSTRUCTOR = 'param';

const S3_ROOT = /^s3:\/\/([^/]+)(?:\/(.*))?$/;

/**
 * Extract mount-point and workflow-parameter declarations from the top level of a script.
 *
 * Only `const NAME = mountPoint(local, remote)` and `const NAME = param(default)` are
 * recognised; every argument has to be a literal.
 */
export function scanDeclarations(script: ParsedScript): DeclarationSet {
  const all: Declaration[] = [];

  for (const statement of script.sourceFile.statements) {
    if (!ts.isVariableStatement(statement)) continue;

    for (const declaration of statement.declarationList.declarations) {
      const init = declaration.initializer;
      if (!init || !ts.isCallExpression(init)) continue;
      const constructor = calleeName(init);
      if (constructor !== MOUNT_POINT_CONSTRUCTOR && constructor !== PARAMETER_CONSTRUCTOR) {
        continue;
      }

      if (!(statement.declarationList.flags & ts.NodeFlags.Const)) {
        throw new UnsupportedConstructError(
          `${constructor}() declarations must use const`,
          locationOf(script, declaration)
        );
      }
      if (!ts.isIdentifier(declaration.name)) {
        throw new UnsupportedConstructError(
          `${constructor}() must be assigned to a plain identifier`,
          locationOf(script, declaration.name)
        );
      }

      const parsed =
        constructor === MOUNT_POINT_CONSTRUCTOR
          ? readMountPoint(script, declaration.name, init)
          : readParameter(script, declaration.name, init);
      logger.debug(`Found ${parsed.kind} '${parsed.identifier}' (${parsed.name})`);
      all.push(parsed);
    }
  }

  assertUnique(all);

  return {
    all,
    mountPoints: all.filter((d): d is MountPoint => d.kind === 'mount-point'),
    parameters: all.filter((d): d is WorkflowParameter => d.kind === 'parameter'),
  };
}

function readMountPoint(
  script: ParsedScript,
  name: ts.Identifier,
  call: ts.CallExpression
): MountPoint {
  const [localRoot, remoteRoot] = readStringArguments(script, call, MOUNT_POINT_CONSTRUCTOR, 2);
  const match = S3_ROOT.exec(remoteRoot);
  if (!match) {
    throw new UnsupportedConstructError(
      `Mount point '${name.text}' has remote root '${remoteRoot}'; only s3://bucket[/prefix] roots are supported`,
      locationOf(script, call.arguments[1])
    );
  }

  return {
    kind: 'mount-point',
    identifier: name.text,
    name: toKebabCase(name.text),
    localRoot,
    remoteRoot,
    bucket: match[1],
    prefix: (match[2] ?? '').replace(/^\/+|\/+$/g, ''),
    location: locationOf(script, name),
    declarationName: name,
  };
}

function readParameter(
  script: ParsedScript,
  name: ts.Identifier,
  call: ts.CallExpression
): WorkflowParameter {
  if (call.arguments.length !== 1) {
    throw new UnsupportedConstructError(
      `${PARAMETER_CONSTRUCTOR}() takes exactly one default value, got ${call.arguments.length}`,
      locationOf(script, call)
    );
  }
  const defaultValue = readLiteral(call.arguments[0]);
  if (defaultValue === undefined) {
    throw new UnsupportedExpressionError(
      `Default value of parameter '${name.text}' must be a literal`,
      locationOf(script, call.arguments[0])
    );
  }

  return {
    kind: 'parameter',
    identifier: name.text,
    name: toKebabCase(name.text),
    defaultValue,
    location: locationOf(script, name),
    declarationName: name,
  };
}

function readStringArguments(
  script: ParsedScript,
  call: ts.CallExpression,
  constructor: string,
  count: number
): string[] {
  if (call.arguments.length !== count) {
    throw new UnsupportedConstructError(
      `${constructor}() takes ${count} arguments, got ${call.arguments.length}`,
      locationOf(script, call)
    );
  }
  return call.arguments.map(arg => {
    const value = readLiteral(arg);
    if (typeof value !== 'string') {
      throw new UnsupportedExpressionError(
        `Arguments of ${constructor}() must be string literals`,
        locationOf(script, arg)
      );
    }
    return value;
  });
}

/**
 * Identifiers and their kebab-case names share one namespace
 */
function assertUnique(declarations: Declaration[]): void {
  const byName = new Map<string, Declaration>();
  for (const declaration of declarations) {
    for (const key of new Set([declaration.identifier, declaration.name])) {
      const previous = byName.get(key);
      if (previous && previous !== declaration) {
        throw new DuplicateDeclarationError(
          `'${declaration.identifier}' collides with '${previous.identifier}' declared at ${formatLocation(previous.location)}`,
          declaration.location
        );
      }
      byName.set(key, declaration);
    }
  }
}
