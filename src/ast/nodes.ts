// src/ast/nodes.ts

/**
 * Syntax tree for the supported language subset. Nodes only carry what the
 * renderer needs; comments and original spacing are not represented.
 */

export type CompositeKind = 'contract' | 'resource' | 'struct' | 'enum';
export type VariableKind = 'let' | 'var';
export type Transfer = '=' | '<-' | '<-!';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TypeNode =
    | {type: 'NominalType'; name: string}
    | {type: 'OptionalType'; inner: TypeNode}
    | {type: 'ArrayType'; element: TypeNode}
    | {type: 'DictionaryType'; key: TypeNode; value: TypeNode}
    | {type: 'ReferenceType'; authorized: boolean; referenced: TypeNode}
    | {type: 'ResourceType'; inner: TypeNode}
    /** `Capability<&R>` */
    | {type: 'InstantiatedType'; base: TypeNode; typeArguments: TypeNode[]}
    /** `R{I}`, or `{I, J}` without a base. */
    | {type: 'RestrictedType'; base?: TypeNode; restrictions: string[]}
    /** `((Int, String): Bool)` */
    | {type: 'FunctionType'; parameters: TypeNode[]; returnType: TypeNode};

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type BinaryOperator =
    | '||'
    | '&&'
    | '=='
    | '!='
    | '<'
    | '<='
    | '>'
    | '>='
    | '??'
    | '+'
    | '-'
    | '*'
    | '/'
    | '%';

export type UnaryOperator = '!' | '-' | '<-' | '&';
export type CastOperator = 'as' | 'as?' | 'as!';

export interface Argument {
    label?: string;
    value: Expression;
}

export interface DictionaryEntry {
    key: Expression;
    value: Expression;
}

export type Expression =
    | {type: 'Identifier'; name: string}
    | {type: 'IntegerLiteral'; raw: string}
    | {type: 'FixedPointLiteral'; raw: string}
    | {type: 'StringLiteral'; raw: string}
    | {type: 'BoolLiteral'; value: boolean}
    | {type: 'NilLiteral'}
    | {type: 'PathLiteral'; domain: string; identifier: string}
    | {type: 'ArrayLiteral'; elements: Expression[]}
    | {type: 'DictionaryLiteral'; entries: DictionaryEntry[]}
    | {type: 'UnaryExpression'; operator: UnaryOperator; operand: Expression}
    | {type: 'BinaryExpression'; operator: BinaryOperator; left: Expression; right: Expression}
    | {type: 'ConditionalExpression'; test: Expression; then: Expression; otherwise: Expression}
    | {type: 'CastExpression'; operator: CastOperator; expression: Expression; target: TypeNode}
    | InvocationExpression
    | {type: 'MemberExpression'; object: Expression; name: string; optional: boolean}
    | {type: 'IndexExpression'; object: Expression; index: Expression}
    | {type: 'ForceExpression'; expression: Expression}
    | {type: 'CreateExpression'; invocation: InvocationExpression}
    | {type: 'DestroyExpression'; expression: Expression};

export interface InvocationExpression {
    type: 'InvocationExpression';
    callee: Expression;
    typeArguments: TypeNode[];
    arguments: Argument[];
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export interface Block {
    statements: Statement[];
}

export interface Condition {
    test: Expression;
    message?: Expression;
}

/** `pre { ... }` or `post { ... }`. */
export interface ConditionBlock {
    type: 'ConditionBlock';
    kind: 'pre' | 'post';
    conditions: Condition[];
}

/** A function body: condition blocks come before any statement. */
export interface FunctionBlock extends Block {
    conditions: ConditionBlock[];
}

export interface SwitchCase {
    /** Absent for `default`. */
    test?: Expression;
    statements: Statement[];
}

export interface VariableDeclaration {
    type: 'VariableDeclaration';
    access?: string;
    kind: VariableKind;
    name: string;
    annotation?: TypeNode;
    transfer: Transfer;
    value: Expression;
}

export interface IfStatement {
    type: 'IfStatement';
    /** `if let x = ...` binds through a declaration instead of an expression. */
    test: Expression | VariableDeclaration;
    then: Block;
    otherwise?: Block | IfStatement;
}

export type Statement =
    | VariableDeclaration
    | IfStatement
    | {type: 'WhileStatement'; test: Expression; body: Block}
    | {type: 'ForStatement'; variable: string; iterable: Expression; body: Block}
    | {type: 'SwitchStatement'; subject: Expression; cases: SwitchCase[]}
    | {type: 'ReturnStatement'; value?: Expression}
    | {type: 'BreakStatement'}
    | {type: 'ContinueStatement'}
    | {type: 'EmitStatement'; event: InvocationExpression}
    | {type: 'AssignmentStatement'; target: Expression; operator: Transfer | '<->'; value: Expression}
    | {type: 'ExpressionStatement'; expression: Expression};

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

export interface Parameter {
    label?: string;
    name: string;
    annotation: TypeNode;
}

export interface ImportDeclaration {
    type: 'ImportDeclaration';
    identifiers: string[];
    /** Raw location text: an address literal or a string literal. */
    location: string;
}

export interface CompositeDeclaration {
    type: 'CompositeDeclaration';
    access?: string;
    kind: CompositeKind;
    isInterface: boolean;
    name: string;
    conformances: string[];
    members: Declaration[];
}

export interface FunctionDeclaration {
    type: 'FunctionDeclaration';
    access?: string;
    /** `init`, `destroy` and `prepare` are written without `fun`. */
    special: boolean;
    name: string;
    parameters: Parameter[];
    returnType?: TypeNode;
    body?: FunctionBlock;
}

export interface FieldDeclaration {
    type: 'FieldDeclaration';
    access?: string;
    kind: VariableKind;
    name: string;
    annotation: TypeNode;
}

export interface EventDeclaration {
    type: 'EventDeclaration';
    access?: string;
    name: string;
    parameters: Parameter[];
}

export interface EnumCaseDeclaration {
    type: 'EnumCaseDeclaration';
    access?: string;
    name: string;
}

export type TransactionMember =
    | FieldDeclaration
    | FunctionDeclaration
    | ConditionBlock
    | {type: 'ExecuteBlock'; body: Block};

export interface TransactionDeclaration {
    type: 'TransactionDeclaration';
    /** Absent when the transaction is written without a parameter list. */
    parameters?: Parameter[];
    members: TransactionMember[];
}

export type Declaration =
    | ImportDeclaration
    | CompositeDeclaration
    | FunctionDeclaration
    | FieldDeclaration
    | EventDeclaration
    | EnumCaseDeclaration
    | TransactionDeclaration
    | VariableDeclaration;

export interface Program {
    type: 'Program';
    declarations: Declaration[];
}
