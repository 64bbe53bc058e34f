import {
  parse,
  type ArrowFunctionExpression,
  type AssignmentExpression,
  type CallExpression,
  type Expression,
  type ForOfStatement,
  type MemberExpression,
  type ModuleDeclaration,
  type NewExpression,
  type Node,
  type Pattern,
  type Program,
  type Property,
  type Statement,
  type Super,
  type VariableDeclaration,
} from 'acorn';
import type { GeneratedCode, RuleId, ValidationVerdict, Violation } from '../ir/types.js';
import {
  BINDABLE_INPUTS,
  BLOCKED_PROPERTIES,
  CONSTRUCTABLE,
  FORBIDDEN_NAMES,
  GLOBAL_CALLABLES,
  GLOBAL_VALUES,
  LIMITS,
  ALLOWED_METHODS,
  FRAGMENT_PRELUDE,
  MUTATING_METHODS,
  NAMESPACE_MEMBERS,
  PRIMITIVE_GLOBALS,
  RUNTIME_NAMESPACES,
} from './policy.js';

interface PositionedViolation extends Violation {
  readonly position: number;
}

const IGNORED_KEYS = new Set(['start', 'end', 'loc', 'range', 'raw', 'regex']);

function isNode(value: unknown): value is Node {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

function childNodes(node: Node): Node[] {
  const children: Node[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (IGNORED_KEYS.has(key)) continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) children.push(item);
      }
    } else if (isNode(value)) {
      children.push(value);
    }
  }
  return children;
}

function isDeclaration(node: Node): node is VariableDeclaration {
  return node.type === 'VariableDeclaration';
}

function isArrow(node: Node): node is ArrowFunctionExpression {
  return node.type === 'ArrowFunctionExpression';
}

function isForOf(node: Node): node is ForOfStatement {
  return node.type === 'ForOfStatement';
}

function isAssignment(node: Node): node is AssignmentExpression {
  return node.type === 'AssignmentExpression';
}

function snippet(source: string, node: Node): string {
  const text = source.slice(node.start, node.end).replace(/\s+/g, ' ');
  return text.length > 40 ? `${text.slice(0, 37)}...` : text;
}

function rootName(expression: Expression | Super): string | undefined {
  let current: Expression | Super = expression;
  while (current.type === 'MemberExpression') {
    current = current.object;
  }
  return current.type === 'Identifier' ? current.name : undefined;
}

interface Census {
  nodes: number;
  depth: number;
  locals: Set<string>;
  /** Locals that only ever hold values the fragment created. */
  owned: Set<string>;
}

// Operators whose result is the right-hand value itself.
const ALIASING_OPERATORS = new Set(['=', '||=', '&&=', '??=']);

function collectBindingNames(pattern: Pattern, into: Set<string>): void {
  switch (pattern.type) {
    case 'Identifier':
      into.add(pattern.name);
      return;
    case 'ArrayPattern':
      for (const element of pattern.elements) {
        if (element) collectBindingNames(element, into);
      }
      return;
    case 'RestElement':
      collectBindingNames(pattern.argument, into);
      return;
    default:
      // other patterns are rejected by the walk
      return;
  }
}

/**
 * Whether evaluating the expression yields a value the fragment made itself,
 * as opposed to an input, a global or something reached through one.
 */
function isFresh(expression: Expression, owned: ReadonlySet<string>): boolean {
  switch (expression.type) {
    case 'Identifier':
      return owned.has(expression.name) || PRIMITIVE_GLOBALS.has(expression.name);
    case 'ConditionalExpression':
      return isFresh(expression.consequent, owned) && isFresh(expression.alternate, owned);
    case 'LogicalExpression':
      return isFresh(expression.left, owned) && isFresh(expression.right, owned);
    case 'SequenceExpression':
      return expression.expressions.every((item) => isFresh(item, owned));
    case 'AssignmentExpression':
      return isFresh(expression.right, owned);
    case 'ChainExpression':
      return expression.expression.type === 'CallExpression';
    case 'MemberExpression':
    case 'ThisExpression':
    case 'MetaProperty':
    case 'ImportExpression':
      return false;
    default:
      return true;
  }
}

function ownedLocals(candidates: Set<string>, sources: Map<string, Expression[]>): Set<string> {
  const owned = new Set(candidates);
  let changed = true;
  while (changed) {
    changed = false;
    for (const name of owned) {
      if ((sources.get(name) ?? []).some((source) => !isFresh(source, owned))) {
        owned.delete(name);
        changed = true;
      }
    }
  }
  return owned;
}

/** Counts nodes, measures nesting and gathers every name the fragment binds. */
function takeCensus(program: Program): Census {
  const census: Census = { nodes: 0, depth: 0, locals: new Set(), owned: new Set() };
  const candidates = new Set<string>();
  const bound = new Set<string>(); // parameters, loop variables and destructured names
  const sources = new Map<string, Expression[]>();
  const addSource = (name: string, source: Expression): void => {
    sources.set(name, [...(sources.get(name) ?? []), source]);
  };
  const stack: [Node, number][] = [[program, 1]];

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [node, depth] = next;
    census.nodes += 1;
    census.depth = Math.max(census.depth, depth);
    if (census.nodes > LIMITS.maxNodes || census.depth > LIMITS.maxDepth) {
      return census;
    }

    if (isDeclaration(node)) {
      for (const declarator of node.declarations) {
        collectBindingNames(declarator.id, census.locals);
        if (declarator.id.type === 'Identifier') {
          candidates.add(declarator.id.name);
          if (declarator.init) addSource(declarator.id.name, declarator.init);
        } else {
          collectBindingNames(declarator.id, bound);
        }
      }
    } else if (isArrow(node)) {
      for (const param of node.params) {
        collectBindingNames(param, census.locals);
        collectBindingNames(param, bound);
      }
    } else if (isForOf(node) && node.left.type === 'VariableDeclaration') {
      for (const declarator of node.left.declarations) {
        collectBindingNames(declarator.id, bound);
      }
    } else if (isAssignment(node) && node.left.type === 'Identifier' && ALIASING_OPERATORS.has(node.operator)) {
      addSource(node.left.name, node.right);
    }

    for (const child of childNodes(node)) {
      stack.push([child, depth + 1]);
    }
  }

  for (const name of bound) candidates.delete(name);
  census.owned = ownedLocals(candidates, sources);
  return census;
}

class FragmentWalker {
  readonly violations: PositionedViolation[] = [];
  private functionDepth = 0;

  constructor(
    private readonly source: string,
    private readonly locals: ReadonlySet<string>,
    private readonly owned: ReadonlySet<string>,
    private readonly inputs: ReadonlySet<string>,
  ) {}

  private report(ruleId: RuleId, node: Node, offendingToken: string, message: string): void {
    this.violations.push({ ruleId, offendingToken, message, position: node.start });
  }

  private unsupported(node: Node, what: string): void {
    this.report('unsupported-construct', node, snippet(this.source, node), `${what} is not supported in analysis code`);
  }

  private forbidden(name: string, node: Node): boolean {
    const ruleId = FORBIDDEN_NAMES.get(name);
    if (ruleId === undefined) return false;
    this.report(ruleId, node, name, `'${name}' is not available to analysis code`);
    return true;
  }

  private isNamespace(name: string): boolean {
    return Object.hasOwn(NAMESPACE_MEMBERS, name) && !this.locals.has(name);
  }

  program(program: Program): void {
    for (const statement of program.body) {
      this.statement(statement);
    }
  }

  private statement(node: Statement | ModuleDeclaration): void {
    switch (node.type) {
      case 'VariableDeclaration':
        this.declaration(node);
        return;
      case 'ExpressionStatement':
        this.expression(node.expression);
        return;
      case 'BlockStatement':
        for (const statement of node.body) this.statement(statement);
        return;
      case 'IfStatement':
        this.expression(node.test);
        this.statement(node.consequent);
        if (node.alternate) this.statement(node.alternate);
        return;
      case 'ForOfStatement':
        if (node.await) {
          this.unsupported(node, 'for await');
          return;
        }
        if (node.left.type === 'VariableDeclaration') {
          this.declaration(node.left);
        } else {
          this.unsupported(node.left, 'A loop without its own binding');
        }
        this.expression(node.right);
        this.statement(node.body);
        return;
      case 'ReturnStatement':
        if (this.functionDepth === 0) {
          this.unsupported(node, 'Top-level return');
        }
        if (node.argument) this.expression(node.argument);
        return;
      case 'EmptyStatement':
        return;
      case 'ImportDeclaration':
        this.report('dynamic-import', node, String(node.source.value), 'Modules cannot be imported');
        return;
      case 'ExportNamedDeclaration':
      case 'ExportDefaultDeclaration':
      case 'ExportAllDeclaration':
        this.report('dynamic-import', node, 'export', 'Analysis code cannot export bindings');
        return;
      default:
        this.unsupported(node, node.type);
    }
  }

  private declaration(node: VariableDeclaration): void {
    if (node.kind === 'var') {
      this.unsupported(node, 'var');
    }
    for (const declarator of node.declarations) {
      this.binding(declarator.id);
      if (declarator.init) this.expression(declarator.init);
    }
  }

  private binding(pattern: Pattern): void {
    switch (pattern.type) {
      case 'Identifier':
        if (!this.forbidden(pattern.name, pattern) && this.inputs.has(pattern.name)) {
          this.report('external-mutation', pattern, pattern.name, `Input '${pattern.name}' cannot be redeclared`);
        }
        return;
      case 'ArrayPattern':
        for (const element of pattern.elements) {
          if (element) this.binding(element);
        }
        return;
      case 'RestElement':
        this.binding(pattern.argument);
        return;
      default:
        this.unsupported(pattern, pattern.type);
    }
  }

  private expression(node: Expression): void {
    switch (node.type) {
      case 'Identifier':
        this.reference(node.name, node);
        return;
      case 'Literal':
        if (node.regex) this.unsupported(node, 'Regular expression');
        else if (node.bigint !== undefined) this.unsupported(node, 'BigInt');
        return;
      case 'TemplateLiteral':
        for (const expression of node.expressions) this.expression(expression);
        return;
      case 'ArrayExpression':
        for (const element of node.elements) {
          if (element === null) continue;
          this.expression(element.type === 'SpreadElement' ? element.argument : element);
        }
        return;
      case 'ObjectExpression':
        for (const property of node.properties) {
          if (property.type === 'SpreadElement') this.expression(property.argument);
          else this.property(property);
        }
        return;
      case 'UnaryExpression':
        if (node.operator === 'delete') {
          this.unsupported(node, 'delete');
        } else {
          this.expression(node.argument);
        }
        return;
      case 'UpdateExpression':
        this.assignmentTarget(node.argument, node);
        return;
      case 'BinaryExpression':
        if (node.left.type === 'PrivateIdentifier') this.unsupported(node.left, 'Private field');
        else this.expression(node.left);
        this.expression(node.right);
        return;
      case 'LogicalExpression':
        this.expression(node.left);
        this.expression(node.right);
        return;
      case 'ConditionalExpression':
        this.expression(node.test);
        this.expression(node.consequent);
        this.expression(node.alternate);
        return;
      case 'AssignmentExpression':
        this.assignmentTarget(node.left, node);
        this.expression(node.right);
        return;
      case 'SequenceExpression':
        for (const expression of node.expressions) this.expression(expression);
        return;
      case 'ArrowFunctionExpression':
        this.arrow(node);
        return;
      case 'CallExpression':
        this.call(node);
        return;
      case 'NewExpression':
        this.construct(node);
        return;
      case 'MemberExpression':
        this.member(node, false);
        return;
      case 'ChainExpression':
        this.expression(node.expression);
        return;
      case 'ThisExpression':
        this.report('global-access', node, 'this', "'this' is not available to analysis code");
        return;
      case 'ImportExpression':
        this.report('dynamic-import', node, 'import()', 'Modules cannot be imported');
        return;
      case 'MetaProperty':
        this.report('dynamic-import', node, snippet(this.source, node), 'Module metadata is not available');
        return;
      default:
        this.unsupported(node, node.type);
    }
  }

  private reference(name: string, node: Node): void {
    if (this.forbidden(name, node)) return;
    if (this.locals.has(name) || this.inputs.has(name)) return;
    if (PRIMITIVE_GLOBALS.has(name)) return;
    if (RUNTIME_NAMESPACES.has(name) || GLOBAL_VALUES.has(name)) {
      this.report('global-access', node, name, `'${name}' can only be called or have its members read`);
      return;
    }
    if (BINDABLE_INPUTS.has(name)) {
      this.report('undeclared-input', node, name, `Input '${name}' is used but not declared`);
      return;
    }
    this.report('unknown-identifier', node, name, `'${name}' is not defined`);
  }

  private property(node: Property): void {
    if (node.kind !== 'init' || node.method) {
      this.unsupported(node, 'Accessor or method definition');
      return;
    }
    if (node.computed) {
      this.expression(node.key);
    } else {
      const key = node.key.type === 'Identifier' ? node.key.name : node.key.type === 'Literal' ? String(node.key.value) : '';
      if (key === '__proto__') {
        this.report('global-access', node.key, key, 'Prototypes cannot be set');
      }
    }
    this.expression(node.value);
  }

  private arrow(node: ArrowFunctionExpression): void {
    if (node.async) {
      this.unsupported(node, 'Async function');
      return;
    }
    for (const param of node.params) this.binding(param);
    this.functionDepth += 1;
    if (node.body.type === 'BlockStatement') {
      this.statement(node.body);
    } else {
      this.expression(node.body);
    }
    this.functionDepth -= 1;
  }

  private member(node: MemberExpression, asCallee: boolean): void {
    let name: string | undefined;
    let literalKey = false;

    if (node.property.type === 'PrivateIdentifier') {
      this.unsupported(node.property, 'Private field');
      return;
    }
    if (!node.computed && node.property.type === 'Identifier') {
      name = node.property.name;
    } else if (node.property.type === 'Literal' && (typeof node.property.value === 'string' || typeof node.property.value === 'number')) {
      name = String(node.property.value);
      literalKey = true;
    } else {
      this.report(
        'dynamic-property-access',
        node.property,
        snippet(this.source, node.property),
        'Property names must be written out',
      );
      this.expression(node.property);
    }

    if (node.object.type === 'Super') {
      this.unsupported(node.object, 'super');
      return;
    }

    if (node.object.type === 'Identifier' && this.isNamespace(node.object.name)) {
      const namespace = node.object.name;
      if (this.forbidden(namespace, node.object) || name === undefined) return;
      if (!NAMESPACE_MEMBERS[namespace].has(name)) {
        if (!this.forbidden(name, node.property)) {
          this.report('disallowed-call', node, `${namespace}.${name}`, `${namespace}.${name} is not allowed`);
        }
      }
      return;
    }

    this.expression(node.object);
    if (name === undefined) return;

    if (BLOCKED_PROPERTIES.has(name)) {
      this.report('global-access', node.property, name, `'${name}' is not accessible`);
    } else if (!literalKey && FORBIDDEN_NAMES.has(name)) {
      this.forbidden(name, node.property);
    } else if (asCallee && !ALLOWED_METHODS.has(name)) {
      this.report('disallowed-call', node.property, name, `Method '${name}' is not allowed`);
    } else if (asCallee && MUTATING_METHODS.has(name) && !this.ownsValue(node.object)) {
      this.report('external-mutation', node.property, name, `'${name}' would modify a value the fragment does not own`);
    }
  }

  private ownsValue(expression: Expression): boolean {
    if (expression.type === 'Identifier') {
      return this.owned.has(expression.name) && !this.inputs.has(expression.name);
    }
    return isFresh(expression, this.owned);
  }

  private call(node: CallExpression): void {
    const callee = node.callee;
    if (callee.type === 'Super') {
      this.unsupported(callee, 'super');
    } else if (callee.type === 'Identifier') {
      const name = callee.name;
      if (!this.forbidden(name, callee) && !this.locals.has(name) && !GLOBAL_CALLABLES.has(name)) {
        if (this.inputs.has(name) || RUNTIME_NAMESPACES.has(name) || GLOBAL_VALUES.has(name)) {
          this.report('disallowed-call', callee, name, `'${name}' cannot be called`);
        } else {
          this.reference(name, callee);
        }
      }
    } else if (callee.type === 'MemberExpression') {
      this.member(callee, true);
    } else {
      this.expression(callee);
    }

    for (const argument of node.arguments) {
      this.expression(argument.type === 'SpreadElement' ? argument.argument : argument);
    }
  }

  private construct(node: NewExpression): void {
    const callee = node.callee;
    if (callee.type === 'Identifier') {
      const name = callee.name;
      if (!this.forbidden(name, callee) && (!CONSTRUCTABLE.has(name) || this.locals.has(name))) {
        this.report('disallowed-call', callee, name, `'new ${name}' is not allowed`);
      }
    } else {
      this.report('disallowed-call', callee, snippet(this.source, callee), 'Only Map and Set can be constructed');
    }
    for (const argument of node.arguments) {
      this.expression(argument.type === 'SpreadElement' ? argument.argument : argument);
    }
  }

  private assignmentTarget(target: Pattern | Expression, node: Node): void {
    switch (target.type) {
      case 'Identifier':
        if (this.forbidden(target.name, target)) return;
        if (!this.locals.has(target.name) || this.inputs.has(target.name)) {
          this.report('external-mutation', node, target.name, `'${target.name}' is not a local binding`);
        }
        return;
      case 'MemberExpression': {
        // only a direct property of a value the fragment created
        if (target.object.type === 'Identifier' && this.ownsValue(target.object)) {
          this.member(target, false);
        } else {
          const root = rootName(target);
          this.report('external-mutation', node, root ?? snippet(this.source, target), 'Only values created by the fragment can be modified');
        }
        return;
      }
      default:
        this.unsupported(target, 'Destructuring assignment');
    }
  }
}

function hasTopLevelResult(program: Program): boolean {
  return program.body.some(
    (statement) =>
      statement.type === 'VariableDeclaration' &&
      statement.declarations.some((declarator) => declarator.id.type === 'Identifier' && declarator.id.name === 'result'),
  );
}

function verdict(violations: readonly Violation[]): ValidationVerdict {
  return Object.freeze({ approved: violations.length === 0, violations: Object.freeze([...violations]) });
}

function single(ruleId: RuleId, offendingToken: string, message: string): ValidationVerdict {
  return verdict([Object.freeze({ ruleId, offendingToken, message })]);
}

/**
 * Decide whether a fragment may run. Pure: the verdict depends only on the
 * source text and the declared inputs.
 */
export function validateSource(source: string, declaredInputs: ReadonlySet<string>): ValidationVerdict {
  if (source.length > LIMITS.maxSourceLength) {
    return single(
      'unsupported-construct',
      `${source.length} characters`,
      `Code is longer than ${LIMITS.maxSourceLength} characters`,
    );
  }

  const text = FRAGMENT_PRELUDE + source;
  let program: Program;
  try {
    program = parse(text, { ecmaVersion: 2022, sourceType: 'script', allowImportExportEverywhere: true });
  } catch (error) {
    if (error instanceof SyntaxError) {
      return single('syntax-error', source.slice(0, 40), error.message);
    }
    if (error instanceof RangeError) {
      return single('unsupported-construct', 'nesting', 'Code is nested too deeply to parse');
    }
    throw error;
  }

  const census = takeCensus(program);
  if (census.nodes > LIMITS.maxNodes) {
    return single('unsupported-construct', `${census.nodes}+ nodes`, `Code has more than ${LIMITS.maxNodes} syntax nodes`);
  }
  if (census.depth > LIMITS.maxDepth) {
    return single('unsupported-construct', `depth ${census.depth}`, `Code is nested deeper than ${LIMITS.maxDepth} levels`);
  }

  const violations: PositionedViolation[] = [];
  for (const input of declaredInputs) {
    if (!BINDABLE_INPUTS.has(input)) {
      violations.push({
        ruleId: 'undeclared-input',
        offendingToken: input,
        message: `'${input}' is not an input the sandbox can provide`,
        position: -1,
      });
    }
  }

  const walker = new FragmentWalker(text, census.locals, census.owned, declaredInputs);
  walker.program(program);
  violations.push(...walker.violations);

  if (!hasTopLevelResult(program)) {
    violations.push({
      ruleId: 'missing-result',
      offendingToken: 'result',
      message: "Code must declare a top-level 'result'",
      position: text.length,
    });
  }

  const ordered = violations
    .map((violation, index) => ({ violation, index }))
    .sort((a, b) => a.violation.position - b.violation.position || a.index - b.index)
    .map(({ violation }) =>
      Object.freeze({ ruleId: violation.ruleId, offendingToken: violation.offendingToken, message: violation.message }),
    );
  return verdict(ordered);
}

export function validate(code: GeneratedCode): ValidationVerdict {
  return validateSource(code.source, code.declaredInputs);
}
