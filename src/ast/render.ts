// src/ast/render.ts

import {doc} from 'prettier';
import {BINARY_PRECEDENCE, RIGHT_ASSOCIATIVE} from './parser';
import type {
    Argument,
    Block,
    CompositeDeclaration,
    Condition,
    ConditionBlock,
    Declaration,
    Expression,
    FunctionBlock,
    FunctionDeclaration,
    IfStatement,
    InvocationExpression,
    Parameter,
    Program,
    Statement,
    SwitchCase,
    TransactionDeclaration,
    TransactionMember,
    TypeNode,
    VariableDeclaration,
} from './nodes';

type Doc = doc.builders.Doc;

const {group, indent, join, line, softline, hardline} = doc.builders;

export interface RenderOptions {
    /** Target line width for the layout algorithm. */
    maxLineWidth: number;
    /** One level of indentation: a run of spaces or a single tab. */
    indentUnit: string;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
    maxLineWidth: 80,
    indentUnit: '    ',
};

/**
 * Canonical, comment-free rendering of a program.
 *
 * Top-level declarations are separated by a blank line (imports by a single
 * line break); composite members likewise, except consecutive fields. The
 * output has no final newline.
 */
export function renderProgram(program: Program, options: Partial<RenderOptions> = {}): string {
    const {maxLineWidth, indentUnit} = {...DEFAULT_RENDER_OPTIONS, ...options};
    const useTabs = indentUnit === '\t';
    return doc.printer.printDocToString(printProgram(program), {
        printWidth: maxLineWidth,
        tabWidth: useTabs ? 4 : indentUnit.length,
        useTabs,
    }).formatted;
}

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

function printProgram(program: Program): Doc {
    return joinSeparated(program.declarations, printDeclaration, (prev, next) =>
        prev.type === 'ImportDeclaration' && next.type === 'ImportDeclaration',
    );
}

/**
 * Items separated by a blank line, or by a single line break where
 * `tight(prev, next)` holds.
 */
function joinSeparated<T>(items: T[], print: (item: T) => Doc, tight: (prev: T, next: T) => boolean): Doc {
    const parts: Doc[] = [];
    items.forEach((item, i) => {
        if (i > 0) {
            parts.push(tight(items[i - 1], item) ? hardline : [hardline, hardline]);
        }
        parts.push(print(item));
    });
    return parts;
}

/** Fields (and enum cases) stay on consecutive lines. */
function sameTightKind(prev: {type: string}, next: {type: string}): boolean {
    return prev.type === next.type && (prev.type === 'FieldDeclaration' || prev.type === 'EnumCaseDeclaration');
}

function printDeclaration(declaration: Declaration): Doc {
    switch (declaration.type) {
        case 'ImportDeclaration':
            return declaration.identifiers.length === 0
                ? ['import ', declaration.location]
                : ['import ', declaration.identifiers.join(', '), ' from ', declaration.location];
        case 'CompositeDeclaration':
            return printComposite(declaration);
        case 'FunctionDeclaration':
            return printFunction(declaration);
        case 'FieldDeclaration':
            return [
                accessPrefix(declaration.access),
                declaration.kind,
                ' ',
                declaration.name,
                ': ',
                printType(declaration.annotation),
            ];
        case 'EventDeclaration':
            return [
                accessPrefix(declaration.access),
                'event ',
                declaration.name,
                printParameters(declaration.parameters),
            ];
        case 'EnumCaseDeclaration':
            return [accessPrefix(declaration.access), 'case ', declaration.name];
        case 'TransactionDeclaration':
            return printTransaction(declaration);
        case 'VariableDeclaration':
            return printVariable(declaration);
    }
}

function printComposite(composite: CompositeDeclaration): Doc {
    const header: Doc[] = [
        accessPrefix(composite.access),
        composite.kind,
        composite.isInterface ? ' interface ' : ' ',
        composite.name,
    ];
    if (composite.conformances.length > 0) {
        header.push(': ', composite.conformances.join(', '));
    }
    const members = joinSeparated(composite.members, printDeclaration, sameTightKind);
    return [...header, ' ', printBlockBody(composite.members.length > 0 ? [members] : [])];
}

function printTransaction(transaction: TransactionDeclaration): Doc {
    const header: Doc[] = ['transaction'];
    if (transaction.parameters) {
        header.push(printParameters(transaction.parameters));
    }
    const members = joinSeparated(transaction.members, printTransactionMember, sameTightKind);
    return [...header, ' ', printBlockBody(transaction.members.length > 0 ? [members] : [])];
}

function printTransactionMember(member: TransactionMember): Doc {
    switch (member.type) {
        case 'ConditionBlock':
            return printConditionBlock(member);
        case 'ExecuteBlock':
            return ['execute ', printBlock(member.body)];
        default:
            return printDeclaration(member);
    }
}

function printFunction(fn: FunctionDeclaration): Doc {
    const parts: Doc[] = [
        accessPrefix(fn.access),
        fn.special ? '' : 'fun ',
        fn.name,
        printParameters(fn.parameters),
    ];
    if (fn.returnType) {
        parts.push(': ', printType(fn.returnType));
    }
    if (fn.body) {
        parts.push(' ', printFunctionBlock(fn.body));
    }
    return parts;
}

function printParameters(parameters: Parameter[]): Doc {
    return printDelimited('(', ')', parameters.map((p) => [
        p.label === undefined ? '' : `${p.label} `,
        p.name,
        ': ',
        printType(p.annotation),
    ]));
}

function printVariable(variable: VariableDeclaration): Doc {
    return [
        accessPrefix(variable.access),
        variable.kind,
        ' ',
        variable.name,
        variable.annotation ? [': ', printType(variable.annotation)] : '',
        ' ',
        variable.transfer,
        ' ',
        printExpression(variable.value),
    ];
}

function accessPrefix(access: string | undefined): string {
    return access === undefined ? '' : `${access} `;
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

function printBlock(block: Block): Doc {
    return printBlockBody(block.statements.map(printStatement));
}

function printFunctionBlock(block: FunctionBlock): Doc {
    return printBlockBody([
        ...block.conditions.map(printConditionBlock),
        ...block.statements.map(printStatement),
    ]);
}

function printConditionBlock(block: ConditionBlock): Doc {
    return [block.kind, ' ', printBlockBody(block.conditions.map(printCondition))];
}

function printCondition(condition: Condition): Doc {
    return condition.message
        ? [printExpression(condition.test), ': ', printExpression(condition.message)]
        : printExpression(condition.test);
}

/**
 * `{`, the body one level deeper, `}`. An empty body still gets its own
 * (blank) line; the reconciler collapses it to `{}`.
 */
function printBlockBody(body: Doc[]): Doc {
    return ['{', indent([hardline, join(hardline, body)]), hardline, '}'];
}

function printStatement(statement: Statement): Doc {
    switch (statement.type) {
        case 'VariableDeclaration':
            return printVariable(statement);
        case 'IfStatement':
            return printIf(statement);
        case 'WhileStatement':
            return ['while ', printExpression(statement.test), ' ', printBlock(statement.body)];
        case 'ForStatement':
            return [
                'for ',
                statement.variable,
                ' in ',
                printExpression(statement.iterable),
                ' ',
                printBlock(statement.body),
            ];
        case 'SwitchStatement':
            return [
                'switch ',
                printExpression(statement.subject),
                ' ',
                printBlockBody(statement.cases.map(printSwitchCase)),
            ];
        case 'ReturnStatement':
            return statement.value ? ['return ', printExpression(statement.value)] : 'return';
        case 'BreakStatement':
            return 'break';
        case 'ContinueStatement':
            return 'continue';
        case 'EmitStatement':
            return ['emit ', printExpression(statement.event)];
        case 'AssignmentStatement':
            return [
                printExpression(statement.target),
                ' ',
                statement.operator,
                ' ',
                printExpression(statement.value),
            ];
        case 'ExpressionStatement':
            return printExpression(statement.expression);
    }
}

function printSwitchCase(switchCase: SwitchCase): Doc {
    const label: Doc = switchCase.test ? ['case ', printExpression(switchCase.test), ':'] : 'default:';
    if (switchCase.statements.length === 0) {
        return label;
    }
    return [label, indent([hardline, join(hardline, switchCase.statements.map(printStatement))])];
}

function printIf(statement: IfStatement): Doc {
    const test = statement.test.type === 'VariableDeclaration'
        ? printVariable(statement.test)
        : printExpression(statement.test);
    const parts: Doc[] = ['if ', test, ' ', printBlock(statement.then)];
    if (statement.otherwise) {
        parts.push(
            ' else ',
            'statements' in statement.otherwise
                ? printBlock(statement.otherwise)
                : printIf(statement.otherwise),
        );
    }
    return parts;
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

const CONDITIONAL_PRECEDENCE = 1;
const CAST_PRECEDENCE = 8;
const UNARY_PRECEDENCE = 9;
const POSTFIX_PRECEDENCE = 10;
const PRIMARY_PRECEDENCE = 11;

function precedenceOf(expression: Expression): number {
    switch (expression.type) {
        case 'ConditionalExpression':
            return CONDITIONAL_PRECEDENCE;
        case 'BinaryExpression':
            return BINARY_PRECEDENCE[expression.operator];
        case 'CastExpression':
            return CAST_PRECEDENCE;
        case 'UnaryExpression':
        case 'CreateExpression':
        case 'DestroyExpression':
            return UNARY_PRECEDENCE;
        case 'InvocationExpression':
        case 'MemberExpression':
        case 'IndexExpression':
        case 'ForceExpression':
            return POSTFIX_PRECEDENCE;
        default:
            return PRIMARY_PRECEDENCE;
    }
}

/** Print `expression`, parenthesized if it binds looser than `minPrecedence`. */
function printOperand(expression: Expression, minPrecedence: number): Doc {
    const printed = printExpression(expression);
    return precedenceOf(expression) < minPrecedence ? ['(', printed, ')'] : printed;
}

function printExpression(expression: Expression): Doc {
    switch (expression.type) {
        case 'Identifier':
            return expression.name;
        case 'IntegerLiteral':
        case 'FixedPointLiteral':
        case 'StringLiteral':
            return expression.raw;
        case 'BoolLiteral':
            return expression.value ? 'true' : 'false';
        case 'NilLiteral':
            return 'nil';
        case 'PathLiteral':
            return `/${expression.domain}/${expression.identifier}`;
        case 'ArrayLiteral':
            return printDelimited('[', ']', expression.elements.map(printExpression));
        case 'DictionaryLiteral':
            return printDelimited('{', '}', expression.entries.map((entry) => [
                printExpression(entry.key),
                ': ',
                printExpression(entry.value),
            ]));
        case 'UnaryExpression':
            return [expression.operator, printOperand(expression.operand, UNARY_PRECEDENCE)];
        case 'BinaryExpression': {
            const precedence = BINARY_PRECEDENCE[expression.operator];
            const rightAssociative = RIGHT_ASSOCIATIVE.has(expression.operator);
            return group([
                printOperand(expression.left, rightAssociative ? precedence + 1 : precedence),
                ' ',
                expression.operator,
                indent([line, printOperand(expression.right, rightAssociative ? precedence : precedence + 1)]),
            ]);
        }
        case 'ConditionalExpression':
            return group([
                printOperand(expression.test, CONDITIONAL_PRECEDENCE + 1),
                indent([
                    line,
                    '? ',
                    printExpression(expression.then),
                    line,
                    ': ',
                    printExpression(expression.otherwise),
                ]),
            ]);
        case 'CastExpression':
            return [
                printOperand(expression.expression, CAST_PRECEDENCE),
                ' ',
                expression.operator,
                ' ',
                printType(expression.target),
            ];
        case 'InvocationExpression':
            return printInvocation(expression);
        case 'MemberExpression':
            return [
                printOperand(expression.object, POSTFIX_PRECEDENCE),
                expression.optional ? '?.' : '.',
                expression.name,
            ];
        case 'IndexExpression':
            return [
                printOperand(expression.object, POSTFIX_PRECEDENCE),
                '[',
                printExpression(expression.index),
                ']',
            ];
        case 'ForceExpression':
            return [printOperand(expression.expression, POSTFIX_PRECEDENCE), '!'];
        case 'CreateExpression':
            return ['create ', printInvocation(expression.invocation)];
        case 'DestroyExpression':
            return ['destroy ', printOperand(expression.expression, UNARY_PRECEDENCE)];
    }
}

function printInvocation(invocation: InvocationExpression): Doc {
    return [
        printOperand(invocation.callee, POSTFIX_PRECEDENCE),
        invocation.typeArguments.length > 0 ? printTypeArguments(invocation.typeArguments) : '',
        printDelimited('(', ')', invocation.arguments.map(printArgument)),
    ];
}

function printArgument(argument: Argument): Doc {
    return argument.label === undefined
        ? printExpression(argument.value)
        : [argument.label, ': ', printExpression(argument.value)];
}

/**
 * Comma-separated items that stay on one line when they fit, and otherwise
 * go one per line, indented, between the delimiters.
 */
function printDelimited(open: string, close: string, items: Doc[]): Doc {
    if (items.length === 0) {
        return open + close;
    }
    return group([open, indent([softline, join([',', line], items)]), softline, close]);
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

function printType(type: TypeNode): Doc {
    switch (type.type) {
        case 'NominalType':
            return type.name;
        case 'OptionalType':
            return [printType(type.inner), '?'];
        case 'ArrayType':
            return ['[', printType(type.element), ']'];
        case 'DictionaryType':
            return ['{', printType(type.key), ': ', printType(type.value), '}'];
        case 'ReferenceType':
            return [type.authorized ? 'auth &' : '&', printType(type.referenced)];
        case 'ResourceType':
            return ['@', printType(type.inner)];
        case 'InstantiatedType':
            return [printType(type.base), printTypeArguments(type.typeArguments)];
        case 'RestrictedType':
            return [type.base ? printType(type.base) : '', '{', type.restrictions.join(', '), '}'];
        case 'FunctionType':
            return ['((', join(', ', type.parameters.map(printType)), '): ', printType(type.returnType), ')'];
    }
}

function printTypeArguments(typeArguments: TypeNode[]): Doc {
    return ['<', join(', ', typeArguments.map(printType)), '>'];
}
