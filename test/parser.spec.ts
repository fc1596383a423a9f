// test/parser.spec.ts

import { describe, it, expect } from 'vitest';
import { formatParseFailure, MAX_NESTING_DEPTH, parseProgram, type Program } from '../src/ast';

function parseOk(text: string): Program {
    const result = parseProgram(text);
    expect(result.diagnostics).toEqual([]);
    if (!result.program) throw new Error('expected a program');
    return result.program;
}

describe('parseProgram', () => {
    it('parses imports and a composite with members', () => {
        const program = parseOk([
            'import Token, Other from 0x01',
            'pub contract Bank: Token.Receiver {',
            '    pub(set) var total: UFix64',
            '    init() { self.total = 0.0 }',
            '}',
        ].join('\n'));

        expect(program.declarations[0]).toEqual({
            type: 'ImportDeclaration',
            identifiers: ['Token', 'Other'],
            location: '0x01',
        });

        const bank = program.declarations[1];
        expect(bank).toMatchObject({
            type: 'CompositeDeclaration',
            access: 'pub',
            kind: 'contract',
            isInterface: false,
            name: 'Bank',
            conformances: ['Token.Receiver'],
        });
        if (bank.type !== 'CompositeDeclaration') throw new Error('expected a composite');
        expect(bank.members.map((m) => m.type)).toEqual(['FieldDeclaration', 'FunctionDeclaration']);
        expect(bank.members[0]).toMatchObject({ access: 'pub(set)', kind: 'var', name: 'total' });
        expect(bank.members[1]).toMatchObject({ special: true, name: 'init', parameters: [] });
    });

    it('parses labelled parameters and nested type forms', () => {
        const program = parseOk('fun f(from account: AuthAccount, refs: [&Vault], map: {String: @R?}): auth &R? {}');
        const fn = program.declarations[0];
        if (fn.type !== 'FunctionDeclaration') throw new Error('expected a function');

        expect(fn.parameters).toEqual([
            { label: 'from', name: 'account', annotation: { type: 'NominalType', name: 'AuthAccount' } },
            {
                label: undefined,
                name: 'refs',
                annotation: {
                    type: 'ArrayType',
                    element: { type: 'ReferenceType', authorized: false, referenced: { type: 'NominalType', name: 'Vault' } },
                },
            },
            {
                label: undefined,
                name: 'map',
                annotation: {
                    type: 'DictionaryType',
                    key: { type: 'NominalType', name: 'String' },
                    value: { type: 'ResourceType', inner: { type: 'OptionalType', inner: { type: 'NominalType', name: 'R' } } },
                },
            },
        ]);
        expect(fn.returnType).toEqual({
            type: 'ReferenceType',
            authorized: true,
            referenced: { type: 'OptionalType', inner: { type: 'NominalType', name: 'R' } },
        });
        expect(fn.body).toEqual({ conditions: [], statements: [] });
    });

    it('applies operator precedence and drops parentheses', () => {
        const program = parseOk('let x = (a + b) * c ?? d');
        expect(program.declarations[0]).toMatchObject({
            type: 'VariableDeclaration',
            value: {
                type: 'BinaryExpression',
                operator: '??',
                left: {
                    type: 'BinaryExpression',
                    operator: '*',
                    left: { type: 'BinaryExpression', operator: '+' },
                    right: { type: 'Identifier', name: 'c' },
                },
                right: { type: 'Identifier', name: 'd' },
            },
        });
    });

    it('distinguishes the cast forms', () => {
        const program = parseOk('let a = x as Int\nlet b = y as? Int\nlet c = &z as! &R');
        const casts = program.declarations.map((d) => (d.type === 'VariableDeclaration' ? d.value : undefined));
        expect(casts[0]).toMatchObject({ type: 'CastExpression', operator: 'as' });
        expect(casts[1]).toMatchObject({ type: 'CastExpression', operator: 'as?' });
        expect(casts[2]).toMatchObject({
            type: 'CastExpression',
            operator: 'as!',
            expression: { type: 'UnaryExpression', operator: '&' },
            target: { type: 'ReferenceType', authorized: false },
        });
    });

    it('does not continue a call across a line break', () => {
        const program = parseOk('fun f() {\n    let a = b\n    (c)\n}');
        const fn = program.declarations[0];
        if (fn.type !== 'FunctionDeclaration' || !fn.body) throw new Error('expected a function body');
        expect(fn.body.statements.map((s) => s.type)).toEqual(['VariableDeclaration', 'ExpressionStatement']);
    });

    it('parses statements', () => {
        const program = parseOk([
            'fun f() {',
            '    if let x = y { return } else if z { while a { break } } else { emit E(v: 1) }',
            '    for item in items { total = total + item }',
            '    a <-> b',
            '    let r <- create R()',
            '    destroy r',
            '}',
        ].join('\n'));
        const fn = program.declarations[0];
        if (fn.type !== 'FunctionDeclaration' || !fn.body) throw new Error('expected a function body');

        expect(fn.body.statements.map((s) => s.type)).toEqual([
            'IfStatement',
            'ForStatement',
            'AssignmentStatement',
            'VariableDeclaration',
            'ExpressionStatement',
        ]);
        expect(fn.body.statements[0]).toMatchObject({
            test: { type: 'VariableDeclaration', name: 'x' },
            then: { statements: [{ type: 'ReturnStatement', value: undefined }] },
            otherwise: { type: 'IfStatement', otherwise: { statements: [{ type: 'EmitStatement' }] } },
        });
        expect(fn.body.statements[2]).toMatchObject({ operator: '<->' });
        expect(fn.body.statements[3]).toMatchObject({ transfer: '<-', value: { type: 'CreateExpression' } });
        expect(fn.body.statements[4]).toMatchObject({ expression: { type: 'DestroyExpression' } });
    });

    it('accepts optional semicolons between statements', () => {
        const program = parseOk('let a = 1; let b = 2;');
        expect(program.declarations.map((d) => d.type)).toEqual(['VariableDeclaration', 'VariableDeclaration']);
    });

    it('parses a transaction with its phases', () => {
        const program = parseOk([
            'transaction(amount: UFix64) {',
            '    let vault: @Vault',
            '    prepare(signer: AuthAccount) {',
            '        self.vault <- signer.withdraw(amount: amount)',
            '    }',
            '    pre {',
            '        amount > 0.0: "positive"',
            '    }',
            '    execute {',
            '        deposit(<-self.vault)',
            '    }',
            '    post { done }',
            '}',
        ].join('\n'));

        const tx = program.declarations[0];
        if (tx.type !== 'TransactionDeclaration') throw new Error('expected a transaction');
        expect(tx.parameters).toEqual([
            { label: undefined, name: 'amount', annotation: { type: 'NominalType', name: 'UFix64' } },
        ]);
        expect(tx.members.map((m) => m.type)).toEqual([
            'FieldDeclaration',
            'FunctionDeclaration',
            'ConditionBlock',
            'ExecuteBlock',
            'ConditionBlock',
        ]);
        expect(tx.members[1]).toMatchObject({ special: true, name: 'prepare' });
        expect(tx.members[2]).toEqual({
            type: 'ConditionBlock',
            kind: 'pre',
            conditions: [
                {
                    test: {
                        type: 'BinaryExpression',
                        operator: '>',
                        left: { type: 'Identifier', name: 'amount' },
                        right: { type: 'FixedPointLiteral', raw: '0.0' },
                    },
                    message: { type: 'StringLiteral', raw: '"positive"' },
                },
            ],
        });
        expect(tx.members[4]).toEqual({
            type: 'ConditionBlock',
            kind: 'post',
            conditions: [{ test: { type: 'Identifier', name: 'done' }, message: undefined }],
        });
    });

    it('parses a transaction without parameters', () => {
        const program = parseOk('transaction {\n    execute {}\n}');
        expect(program.declarations[0]).toEqual({
            type: 'TransactionDeclaration',
            parameters: undefined,
            members: [{ type: 'ExecuteBlock', body: { statements: [] } }],
        });
    });

    it('rejects a statement at transaction level', () => {
        const result = parseProgram('transaction {\n    log(1)\n}');
        expect(result.diagnostics[0]).toMatchObject({
            line: 2,
            column: 4,
            message: "expected transaction member, got 'log'",
        });
    });

    it('reads pre and post conditions at the start of a function body', () => {
        const program = parseOk('fun f(x: Int): Int {\n    pre { x > 0: "positive" }\n    post { result == x }\n    return x\n}');
        const fn = program.declarations[0];
        if (fn.type !== 'FunctionDeclaration' || !fn.body) throw new Error('expected a function body');
        expect(fn.body.conditions.map((c) => c.kind)).toEqual(['pre', 'post']);
        expect(fn.body.statements.map((s) => s.type)).toEqual(['ReturnStatement']);
    });

    it('parses enum cases', () => {
        const program = parseOk('pub enum Color: UInt8 {\n    pub case red\n    case green\n}');
        expect(program.declarations[0]).toMatchObject({
            type: 'CompositeDeclaration',
            kind: 'enum',
            conformances: ['UInt8'],
            members: [
                { type: 'EnumCaseDeclaration', access: 'pub', name: 'red' },
                { type: 'EnumCaseDeclaration', access: undefined, name: 'green' },
            ],
        });
    });

    it('parses a switch with cases and a default', () => {
        const program = parseOk('fun f(x: Int) { switch x { case 1: a() default: b(); return } }');
        const fn = program.declarations[0];
        if (fn.type !== 'FunctionDeclaration' || !fn.body) throw new Error('expected a function body');
        expect(fn.body.statements[0]).toMatchObject({
            type: 'SwitchStatement',
            subject: { type: 'Identifier', name: 'x' },
            cases: [
                { test: { type: 'IntegerLiteral', raw: '1' }, statements: [{ type: 'ExpressionStatement' }] },
                { test: undefined, statements: [{ type: 'ExpressionStatement' }, { type: 'ReturnStatement' }] },
            ],
        });
    });

    it('parses type arguments on an invocation', () => {
        const program = parseOk('let r = acct.borrow<&R{I}>(from: /storage/r)');
        expect(program.declarations[0]).toMatchObject({
            value: {
                type: 'InvocationExpression',
                callee: { type: 'MemberExpression', name: 'borrow' },
                typeArguments: [
                    {
                        type: 'ReferenceType',
                        authorized: false,
                        referenced: {
                            type: 'RestrictedType',
                            base: { type: 'NominalType', name: 'R' },
                            restrictions: ['I'],
                        },
                    },
                ],
                arguments: [{ label: 'from', value: { type: 'PathLiteral', domain: 'storage', identifier: 'r' } }],
            },
        });
    });

    it('still reads a tight < as a comparison', () => {
        const program = parseOk('let y = i<n');
        expect(program.declarations[0]).toMatchObject({
            value: {
                type: 'BinaryExpression',
                operator: '<',
                left: { type: 'Identifier', name: 'i' },
                right: { type: 'Identifier', name: 'n' },
            },
        });
    });

    it('parses instantiated, restricted and function types', () => {
        const program = parseOk('let c: Capability<&{A.B}> = x\nlet f: ((Int, String): Bool) = g');
        const [c, f] = program.declarations;
        expect(c).toMatchObject({
            annotation: {
                type: 'InstantiatedType',
                base: { type: 'NominalType', name: 'Capability' },
                typeArguments: [
                    { type: 'ReferenceType', referenced: { type: 'RestrictedType', restrictions: ['A.B'] } },
                ],
            },
        });
        expect(f).toMatchObject({
            annotation: {
                type: 'FunctionType',
                parameters: [
                    { type: 'NominalType', name: 'Int' },
                    { type: 'NominalType', name: 'String' },
                ],
                returnType: { type: 'NominalType', name: 'Bool' },
            },
        });
    });
});

describe('parseProgram diagnostics', () => {
    it('reports the unexpected token with its position', () => {
        const result = parseProgram('pub fun (');
        expect(result.program).toBeNull();
        expect(result.diagnostics).toEqual([
            {
                line: 1,
                column: 8,
                message: "expected function name, got '('",
                severity: 'error',
                code: 'unexpected-token',
            },
        ]);
    });

    it('reports an unterminated string literal', () => {
        const result = parseProgram('let s = "abc');
        expect(result.diagnostics[0]).toMatchObject({
            line: 1,
            column: 8,
            message: 'unterminated string literal',
            code: 'invalid-token',
        });
    });

    it('reports an unexpected character', () => {
        const result = parseProgram('let a = 1 $');
        expect(result.diagnostics[0]).toMatchObject({
            line: 1,
            column: 10,
            message: "unexpected character '$'",
        });
    });

    it('reports a missing closing brace at end of input', () => {
        const result = parseProgram('fun f() {\n  let a = 1\n');
        expect(result.diagnostics[0]).toMatchObject({
            line: 3,
            column: 0,
            message: "expected '}', got end of input",
        });
    });
});

describe('parseProgram nesting', () => {
    it('reports deeply nested parentheses instead of overflowing', () => {
        const result = parseProgram('let x = ' + '('.repeat(20000) + '1' + ')'.repeat(20000));
        expect(result.program).toBeNull();
        expect(result.diagnostics).toHaveLength(1);
        expect(result.diagnostics[0]).toMatchObject({
            line: 1,
            message: 'expression nested too deeply',
            severity: 'error',
            code: 'nesting-depth',
        });
    });

    it('reports a long run of prefix operators', () => {
        const result = parseProgram('let x = ' + '!'.repeat(20000) + 'a');
        expect(result.program).toBeNull();
        expect(result.diagnostics[0]).toMatchObject({ line: 1, code: 'nesting-depth' });
    });

    it('accepts nesting well below the limit', () => {
        const depth = MAX_NESTING_DEPTH / 4;
        parseOk('let x = ' + '('.repeat(depth) + '1' + ')'.repeat(depth));
    });

    it('reports conditions placed after a statement', () => {
        const result = parseProgram('fun f() {\n    let a = 1\n    pre { a }\n}');
        expect(result.diagnostics).toEqual([
            {
                line: 3,
                column: 4,
                message: "'pre' block must open the function body",
                severity: 'error',
                code: 'misplaced-conditions',
            },
        ]);
    });
});

describe('formatParseFailure', () => {
    it('prefixes the message and lists one line per diagnostic', () => {
        const { diagnostics } = parseProgram('pub fun (');
        expect(formatParseFailure(diagnostics)).toBe(
            "Parsing failed:\nerror: expected function name, got '(' at 1:8",
        );
    });
});
