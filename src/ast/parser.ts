// src/ast/parser.ts

import {tokenize} from './lexer';
import {isTriviaToken, type Token, type TokenKind} from './tokens';
import type {
    Argument,
    BinaryOperator,
    Block,
    CastOperator,
    CompositeDeclaration,
    CompositeKind,
    Condition,
    ConditionBlock,
    Declaration,
    DictionaryEntry,
    EventDeclaration,
    Expression,
    FieldDeclaration,
    FunctionBlock,
    FunctionDeclaration,
    IfStatement,
    ImportDeclaration,
    InvocationExpression,
    Parameter,
    Program,
    Statement,
    SwitchCase,
    TransactionDeclaration,
    TransactionMember,
    Transfer,
    TypeNode,
    VariableDeclaration,
    VariableKind,
} from './nodes';

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export interface Diagnostic {
    line: number; // 1-based
    column?: number; // 0-based (optional)
    message: string;
    severity: DiagnosticSeverity;
    code?: string;
}

export interface ParseResult {
    /** `null` when an error diagnostic was produced. */
    program: Program | null;
    diagnostics: Diagnostic[];
}

/** Deepest nesting of declarations, statements, expressions and types. */
export const MAX_NESTING_DEPTH = 256;

const NESTING_MESSAGE = 'expression nested too deeply';

/**
 * Parse source text into a {@link Program}.
 *
 * - Does NOT throw on syntax errors; they come back as diagnostics.
 * - Stops at the first error (no recovery).
 * - Nesting beyond {@link MAX_NESTING_DEPTH}, or beyond what the call stack
 *   holds, is reported as a `nesting-depth` diagnostic.
 */
export function parseProgram(text: string): ParseResult {
    const parser = new Parser(text);
    try {
        return {program: parser.parseProgram(), diagnostics: []};
    } catch (err) {
        if (err instanceof ParseError) {
            return {program: null, diagnostics: [err.diagnostic]};
        }
        if (err instanceof RangeError) {
            const {line, column} = parser.current.start;
            return {
                program: null,
                diagnostics: [{line, column, message: NESTING_MESSAGE, severity: 'error', code: 'nesting-depth'}],
            };
        }
        throw err;
    }
}

/**
 * Render diagnostics as the message returned in place of formatted code.
 */
export function formatParseFailure(diagnostics: Diagnostic[]): string {
    const lines = diagnostics.map((d) => {
        const where = d.column === undefined ? `${d.line}` : `${d.line}:${d.column}`;
        return `${d.severity}: ${d.message} at ${where}`;
    });
    return ['Parsing failed:', ...lines].join('\n');
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

class ParseError extends Error {
    constructor(readonly diagnostic: Diagnostic) {
        super(diagnostic.message);
        this.name = 'ParseError';
    }
}

interface ParserToken extends Token {
    /** A line break occurs in the trivia before this token. */
    newlineBefore: boolean;
    /** Any trivia occurs before this token. */
    spaceBefore: boolean;
}

const COMPOSITE_KINDS: ReadonlySet<string> = new Set(['contract', 'resource', 'struct', 'enum']);
const SPECIAL_FUNCTIONS: ReadonlySet<string> = new Set(['init', 'destroy', 'prepare']);

const BINARY_OPERATORS: Partial<Record<TokenKind, BinaryOperator>> = {
    'double-pipe': '||',
    'double-ampersand': '&&',
    'equal-equal': '==',
    'not-equal': '!=',
    less: '<',
    'less-equal': '<=',
    greater: '>',
    'greater-equal': '>=',
    'double-question': '??',
    plus: '+',
    minus: '-',
    star: '*',
    slash: '/',
    percent: '%',
};

/**
 * Binding power of each binary operator; higher binds tighter.
 * Shared with the renderer so parentheses are only printed where needed.
 */
export const BINARY_PRECEDENCE: Record<BinaryOperator, number> = {
    '||': 2,
    '&&': 3,
    '==': 4,
    '!=': 4,
    '<': 4,
    '<=': 4,
    '>': 4,
    '>=': 4,
    '??': 5,
    '+': 6,
    '-': 6,
    '*': 7,
    '/': 7,
    '%': 7,
};

export const RIGHT_ASSOCIATIVE: ReadonlySet<BinaryOperator> = new Set(['??']);

class Parser {
    private readonly tokens: ParserToken[] = [];
    private index = 0;
    private depth = 0;

    constructor(text: string) {
        let newlineBefore = false;
        let spaceBefore = false;
        for (const token of tokenize(text)) {
            if (isTriviaToken(token)) {
                spaceBefore = true;
                if (token.text.includes('\n')) newlineBefore = true;
                continue;
            }
            this.tokens.push({...token, newlineBefore, spaceBefore});
            newlineBefore = false;
            spaceBefore = false;
        }
    }

    get current(): Token {
        return this.peek();
    }

    parseProgram(): Program {
        const declarations: Declaration[] = [];
        while (!this.at('eof')) {
            declarations.push(this.parseDeclaration('program'));
            this.skipSemicolons();
        }
        return {type: 'Program', declarations};
    }

    // -----------------------------------------------------------------------
    // Declarations
    // -----------------------------------------------------------------------

    private parseDeclaration(context: 'program' | 'composite'): Declaration {
        return this.nested(() => this.parseDeclarationAt(context));
    }

    private parseDeclarationAt(context: 'program' | 'composite'): Declaration {
        const access = this.parseAccess();

        if (context === 'program' && access === undefined) {
            if (this.atKeyword('import')) {
                return this.parseImport();
            }
            if (this.atKeyword('transaction') && (this.peek(1).kind === 'paren-open' || this.peek(1).kind === 'brace-open')) {
                return this.parseTransaction();
            }
        }
        if (context === 'composite' && this.atKeyword('case')) {
            this.advance();
            return {type: 'EnumCaseDeclaration', access, name: this.expectIdentifier('enum case name')};
        }
        if (this.atKeyword('let') || this.atKeyword('var')) {
            return context === 'composite'
                ? this.parseField(access)
                : this.parseVariableDeclaration(access);
        }
        if (this.atKeyword('fun')) {
            this.advance();
            return this.parseFunction(access, false);
        }
        if (SPECIAL_FUNCTIONS.has(this.peek().text) && this.peek().kind === 'identifier' && this.peek(1).kind === 'paren-open') {
            return this.parseFunction(access, true);
        }
        if (this.atKeyword('event')) {
            return this.parseEvent(access);
        }
        if (this.peek().kind === 'identifier' && COMPOSITE_KINDS.has(this.peek().text)) {
            return this.parseComposite(access);
        }

        return this.fail(this.peek(), 'declaration');
    }

    /**
     * `pub`, `priv`, `pub(set)` or `access(<name>)`.
     */
    private parseAccess(): string | undefined {
        if (this.atKeyword('priv')) {
            this.advance();
            return 'priv';
        }
        if (this.atKeyword('pub')) {
            this.advance();
            if (this.at('paren-open') && this.peek(1).text === 'set') {
                this.advance();
                this.advance();
                this.expect('paren-close', "')'");
                return 'pub(set)';
            }
            return 'pub';
        }
        if (this.atKeyword('access') && this.peek(1).kind === 'paren-open') {
            this.advance();
            this.advance();
            const name = this.expectIdentifier('access modifier');
            this.expect('paren-close', "')'");
            return `access(${name})`;
        }
        return undefined;
    }

    private parseImport(): ImportDeclaration {
        this.expectKeyword('import');
        const identifiers: string[] = [];

        if (!this.at('string')) {
            identifiers.push(this.expectIdentifier('imported identifier'));
            while (this.at('comma')) {
                this.advance();
                identifiers.push(this.expectIdentifier('imported identifier'));
            }
            this.expectKeyword('from');
        }

        const location = this.peek();
        if (location.kind !== 'string' && location.kind !== 'integer') {
            return this.fail(location, 'import location');
        }
        this.advance();
        return {type: 'ImportDeclaration', identifiers, location: location.text};
    }

    private parseComposite(access: string | undefined): CompositeDeclaration {
        const token = this.advance();
        const kind = token.text;
        if (!isCompositeKind(kind)) {
            return this.fail(token, 'composite kind');
        }

        let isInterface = false;
        if (this.atKeyword('interface')) {
            this.advance();
            isInterface = true;
        }

        const name = this.expectIdentifier('type name');
        const conformances: string[] = [];
        if (this.at('colon')) {
            this.advance();
            conformances.push(this.parseQualifiedName());
            while (this.at('comma')) {
                this.advance();
                conformances.push(this.parseQualifiedName());
            }
        }

        this.expect('brace-open', "'{'");
        const members: Declaration[] = [];
        while (!this.at('brace-close')) {
            if (this.at('eof')) {
                return this.fail(this.peek(), "'}'");
            }
            members.push(this.parseDeclaration('composite'));
            this.skipSemicolons();
        }
        this.advance();

        return {type: 'CompositeDeclaration', access, kind, isInterface, name, conformances, members};
    }

    private parseFunction(access: string | undefined, special: boolean): FunctionDeclaration {
        const name = this.expectIdentifier('function name');
        const parameters = this.parseParameters();

        let returnType: TypeNode | undefined;
        if (this.at('colon')) {
            this.advance();
            returnType = this.parseType();
        }

        const body = this.at('brace-open') ? this.parseFunctionBlock() : undefined;
        return {type: 'FunctionDeclaration', access, special, name, parameters, returnType, body};
    }

    private parseTransaction(): TransactionDeclaration {
        this.expectKeyword('transaction');
        const parameters = this.at('paren-open') ? this.parseParameters() : undefined;

        this.expect('brace-open', "'{'");
        const members: TransactionMember[] = [];
        while (!this.at('brace-close')) {
            if (this.at('eof')) {
                return this.fail(this.peek(), "'}'");
            }
            members.push(this.parseTransactionMember());
            this.skipSemicolons();
        }
        this.advance();

        return {type: 'TransactionDeclaration', parameters, members};
    }

    private parseTransactionMember(): TransactionMember {
        if (this.atKeyword('let') || this.atKeyword('var')) {
            return this.parseField(undefined);
        }
        if (this.atKeyword('prepare') && this.peek(1).kind === 'paren-open') {
            return this.parseFunction(undefined, true);
        }
        if (this.atConditionBlock()) {
            return this.parseConditionBlock();
        }
        if (this.atKeyword('execute') && this.peek(1).kind === 'brace-open') {
            this.advance();
            return {type: 'ExecuteBlock', body: this.parseBlock()};
        }
        return this.fail(this.peek(), 'transaction member');
    }

    private parseEvent(access: string | undefined): EventDeclaration {
        this.expectKeyword('event');
        const name = this.expectIdentifier('event name');
        return {type: 'EventDeclaration', access, name, parameters: this.parseParameters()};
    }

    private parseField(access: string | undefined): FieldDeclaration {
        const kind = this.parseVariableKind();
        const name = this.expectIdentifier('field name');
        this.expect('colon', "':'");
        return {type: 'FieldDeclaration', access, kind, name, annotation: this.parseType()};
    }

    private parseVariableDeclaration(access?: string): VariableDeclaration {
        const kind = this.parseVariableKind();
        const name = this.expectIdentifier('variable name');

        let annotation: TypeNode | undefined;
        if (this.at('colon')) {
            this.advance();
            annotation = this.parseType();
        }

        const transfer = this.parseTransfer();
        if (!transfer) {
            return this.fail(this.peek(), "'=', '<-' or '<-!'");
        }
        return {
            type: 'VariableDeclaration',
            access,
            kind,
            name,
            annotation,
            transfer,
            value: this.parseExpression(),
        };
    }

    private parseVariableKind(): VariableKind {
        const token = this.advance();
        if (token.text !== 'let' && token.text !== 'var') {
            return this.fail(token, "'let' or 'var'");
        }
        return token.text;
    }

    private parseTransfer(): Transfer | undefined {
        const kind = this.peek().kind;
        if (kind === 'equal' || kind === 'move' || kind === 'force-move') {
            this.advance();
            return kind === 'equal' ? '=' : kind === 'move' ? '<-' : '<-!';
        }
        return undefined;
    }

    private parseParameters(): Parameter[] {
        this.expect('paren-open', "'('");
        const parameters: Parameter[] = [];
        while (!this.at('paren-close')) {
            const first = this.expectIdentifier('parameter name');
            let label: string | undefined;
            let name = first;
            if (this.at('identifier')) {
                label = first;
                name = this.advance().text;
            }
            this.expect('colon', "':'");
            parameters.push({label, name, annotation: this.parseType()});
            if (!this.at('comma')) break;
            this.advance();
        }
        this.expect('paren-close', "')'");
        return parameters;
    }

    // -----------------------------------------------------------------------
    // Types
    // -----------------------------------------------------------------------

    private parseType(): TypeNode {
        return this.nested(() => this.parseTypeAt());
    }

    private parseTypeAt(): TypeNode {
        let result: TypeNode;
        const token = this.peek();

        if (token.kind === 'at') {
            this.advance();
            return {type: 'ResourceType', inner: this.parseType()};
        }

        if (token.kind === 'ampersand' || (token.text === 'auth' && this.peek(1).kind === 'ampersand')) {
            const authorized = token.kind !== 'ampersand';
            if (authorized) this.advance();
            this.advance();
            return {type: 'ReferenceType', authorized, referenced: this.parseType()};
        }

        if (token.kind === 'paren-open') {
            result = this.parseFunctionType();
        } else if (token.kind === 'bracket-open') {
            this.advance();
            const element = this.parseType();
            this.expect('bracket-close', "']'");
            result = {type: 'ArrayType', element};
        } else if (token.kind === 'brace-open') {
            this.advance();
            const first = this.peek();
            const key = this.parseType();
            if (this.at('colon')) {
                this.advance();
                const value = this.parseType();
                this.expect('brace-close', "'}'");
                result = {type: 'DictionaryType', key, value};
            } else {
                // `{I, J}`: restrictions without a base type
                if (key.type !== 'NominalType') {
                    return this.fail(first, 'restriction name');
                }
                const restrictions = [key.name];
                while (this.at('comma')) {
                    this.advance();
                    restrictions.push(this.parseQualifiedName());
                }
                this.expect('brace-close', "'}'");
                result = {type: 'RestrictedType', restrictions};
            }
        } else {
            result = {type: 'NominalType', name: this.parseQualifiedName()};
            if (this.at('less') && !this.peek().spaceBefore) {
                result = {type: 'InstantiatedType', base: result, typeArguments: this.parseTypeArguments()};
            }
            if (this.at('brace-open') && !this.peek().spaceBefore) {
                // `R{I}`; a function body written without a space falls back.
                const restrictions = this.attempt(() => this.parseRestrictions());
                if (restrictions) {
                    result = {type: 'RestrictedType', base: result, restrictions};
                }
            }
        }

        // Optional markers must be attached to the type: `Int?`, `Int??`.
        for (;;) {
            const next = this.peek();
            if (next.spaceBefore) break;
            if (next.kind === 'question') {
                this.advance();
                result = {type: 'OptionalType', inner: result};
            } else if (next.kind === 'double-question') {
                this.advance();
                result = {type: 'OptionalType', inner: {type: 'OptionalType', inner: result}};
            } else {
                break;
            }
        }
        return result;
    }

    /** `((A, B): C)` */
    private parseFunctionType(): TypeNode {
        this.expect('paren-open', "'('");
        this.expect('paren-open', "'('");
        const parameters: TypeNode[] = [];
        while (!this.at('paren-close')) {
            parameters.push(this.parseType());
            if (!this.at('comma')) break;
            this.advance();
        }
        this.expect('paren-close', "')'");
        this.expect('colon', "':'");
        const returnType = this.parseType();
        this.expect('paren-close', "')'");
        return {type: 'FunctionType', parameters, returnType};
    }

    private parseTypeArguments(): TypeNode[] {
        this.expect('less', "'<'");
        const typeArguments = [this.parseType()];
        while (this.at('comma')) {
            this.advance();
            typeArguments.push(this.parseType());
        }
        this.expect('greater', "'>'");
        return typeArguments;
    }

    private parseRestrictions(): string[] {
        this.expect('brace-open', "'{'");
        const restrictions = [this.parseQualifiedName()];
        while (this.at('comma')) {
            this.advance();
            restrictions.push(this.parseQualifiedName());
        }
        this.expect('brace-close', "'}'");
        return restrictions;
    }

    private parseQualifiedName(): string {
        let name = this.expectIdentifier('type name');
        while (this.at('dot')) {
            this.advance();
            name += `.${this.expectIdentifier('type name')}`;
        }
        return name;
    }

    // -----------------------------------------------------------------------
    // Statements
    // -----------------------------------------------------------------------

    private parseBlock(): Block {
        this.expect('brace-open', "'{'");
        return {statements: this.parseStatements()};
    }

    /**
     * Function body: `pre` and `post` blocks, then statements.
     */
    private parseFunctionBlock(): FunctionBlock {
        this.expect('brace-open', "'{'");
        const conditions: ConditionBlock[] = [];
        while (this.atConditionBlock()) {
            conditions.push(this.parseConditionBlock());
            this.skipSemicolons();
        }
        return {conditions, statements: this.parseStatements()};
    }

    /** Statements up to and including the closing brace. */
    private parseStatements(): Statement[] {
        const statements: Statement[] = [];
        while (!this.at('brace-close')) {
            if (this.at('eof')) {
                return this.fail(this.peek(), "'}'");
            }
            statements.push(this.parseStatement());
            this.skipSemicolons();
        }
        this.advance();
        return statements;
    }

    private atConditionBlock(): boolean {
        return (this.atKeyword('pre') || this.atKeyword('post')) && this.peek(1).kind === 'brace-open';
    }

    private parseConditionBlock(): ConditionBlock {
        const kind = this.advance().text === 'pre' ? 'pre' : 'post';
        this.expect('brace-open', "'{'");

        const conditions: Condition[] = [];
        while (!this.at('brace-close')) {
            if (this.at('eof')) {
                return this.fail(this.peek(), "'}'");
            }
            const test = this.parseExpression();
            let message: Expression | undefined;
            if (this.at('colon')) {
                this.advance();
                message = this.parseExpression();
            }
            conditions.push({test, message});
            this.skipSemicolons();
        }
        this.advance();

        return {type: 'ConditionBlock', kind, conditions};
    }

    private parseStatement(): Statement {
        return this.nested(() => this.parseStatementAt());
    }

    private parseStatementAt(): Statement {
        const token = this.peek();
        if (this.atConditionBlock()) {
            return this.error(token, `'${token.text}' block must open the function body`, 'misplaced-conditions');
        }
        if (token.kind === 'identifier') {
            switch (token.text) {
                case 'let':
                case 'var':
                    return this.parseVariableDeclaration();
                case 'if':
                    return this.parseIf();
                case 'switch':
                    return this.parseSwitch();
                case 'while': {
                    this.advance();
                    const test = this.parseExpression();
                    return {type: 'WhileStatement', test, body: this.parseBlock()};
                }
                case 'for': {
                    this.advance();
                    const variable = this.expectIdentifier('loop variable');
                    this.expectKeyword('in');
                    const iterable = this.parseExpression();
                    return {type: 'ForStatement', variable, iterable, body: this.parseBlock()};
                }
                case 'return': {
                    this.advance();
                    const next = this.peek();
                    const bare =
                        next.newlineBefore ||
                        next.kind === 'brace-close' ||
                        next.kind === 'semicolon' ||
                        next.kind === 'eof';
                    return {type: 'ReturnStatement', value: bare ? undefined : this.parseExpression()};
                }
                case 'break':
                    this.advance();
                    return {type: 'BreakStatement'};
                case 'continue':
                    this.advance();
                    return {type: 'ContinueStatement'};
                case 'emit': {
                    this.advance();
                    const start = this.peek();
                    const event = this.parseExpression();
                    if (event.type !== 'InvocationExpression') {
                        return this.fail(start, 'event invocation');
                    }
                    return {type: 'EmitStatement', event};
                }
            }
        }

        const target = this.parseExpression();
        let operator: Transfer | '<->' | undefined = this.parseTransfer();
        if (!operator && this.at('swap')) {
            this.advance();
            operator = '<->';
        }
        if (operator) {
            return {type: 'AssignmentStatement', target, operator, value: this.parseExpression()};
        }
        return {type: 'ExpressionStatement', expression: target};
    }

    private parseSwitch(): Statement {
        this.expectKeyword('switch');
        const subject = this.parseExpression();
        this.expect('brace-open', "'{'");

        const cases: SwitchCase[] = [];
        while (!this.at('brace-close')) {
            let test: Expression | undefined;
            if (this.atKeyword('case')) {
                this.advance();
                test = this.parseExpression();
            } else if (this.atKeyword('default')) {
                this.advance();
            } else {
                return this.fail(this.peek(), "'case' or 'default'");
            }
            this.expect('colon', "':'");

            const statements: Statement[] = [];
            while (!this.at('brace-close') && !this.atKeyword('case') && !this.atKeyword('default')) {
                if (this.at('eof')) {
                    return this.fail(this.peek(), "'}'");
                }
                statements.push(this.parseStatement());
                this.skipSemicolons();
            }
            cases.push({test, statements});
        }
        this.advance();

        return {type: 'SwitchStatement', subject, cases};
    }

    private parseIf(): IfStatement {
        this.expectKeyword('if');
        const test = this.atKeyword('let') || this.atKeyword('var')
            ? this.parseVariableDeclaration()
            : this.parseExpression();
        const then = this.parseBlock();

        let otherwise: Block | IfStatement | undefined;
        if (this.atKeyword('else')) {
            this.advance();
            otherwise = this.atKeyword('if') ? this.parseIf() : this.parseBlock();
        }
        return {type: 'IfStatement', test, then, otherwise};
    }

    // -----------------------------------------------------------------------
    // Expressions
    // -----------------------------------------------------------------------

    private parseExpression(): Expression {
        return this.nested(() => this.parseConditional());
    }

    private parseConditional(): Expression {
        const test = this.parseBinary(0);
        if (!this.at('question')) {
            return test;
        }
        this.advance();
        const then = this.parseExpression();
        this.expect('colon', "':'");
        const otherwise = this.parseExpression();
        return {type: 'ConditionalExpression', test, then, otherwise};
    }

    private parseBinary(minPrecedence: number): Expression {
        let left = this.parseCast();
        for (;;) {
            const operator = BINARY_OPERATORS[this.peek().kind];
            if (!operator) break;
            const precedence = BINARY_PRECEDENCE[operator];
            if (precedence < minPrecedence) break;
            this.advance();
            const right = this.parseBinary(RIGHT_ASSOCIATIVE.has(operator) ? precedence : precedence + 1);
            left = {type: 'BinaryExpression', operator, left, right};
        }
        return left;
    }

    private parseCast(): Expression {
        let expression = this.parseUnary();
        while (this.atKeyword('as')) {
            this.advance();
            let operator: CastOperator = 'as';
            const next = this.peek();
            if (!next.spaceBefore && next.kind === 'question') {
                this.advance();
                operator = 'as?';
            } else if (!next.spaceBefore && next.kind === 'exclamation') {
                this.advance();
                operator = 'as!';
            }
            expression = {type: 'CastExpression', operator, expression, target: this.parseType()};
        }
        return expression;
    }

    private parseUnary(): Expression {
        return this.nested(() => this.parseUnaryAt());
    }

    private parseUnaryAt(): Expression {
        const token = this.peek();
        switch (token.kind) {
            case 'exclamation':
                this.advance();
                return {type: 'UnaryExpression', operator: '!', operand: this.parseUnary()};
            case 'minus':
                this.advance();
                return {type: 'UnaryExpression', operator: '-', operand: this.parseUnary()};
            case 'move':
                this.advance();
                return {type: 'UnaryExpression', operator: '<-', operand: this.parseUnary()};
            case 'ampersand':
                this.advance();
                return {type: 'UnaryExpression', operator: '&', operand: this.parseUnary()};
            case 'identifier':
                if (token.text === 'create') {
                    this.advance();
                    const start = this.peek();
                    const invocation = this.parsePostfix();
                    if (invocation.type !== 'InvocationExpression') {
                        return this.fail(start, 'invocation after create');
                    }
                    return {type: 'CreateExpression', invocation};
                }
                if (token.text === 'destroy') {
                    this.advance();
                    return {type: 'DestroyExpression', expression: this.parseUnary()};
                }
                break;
        }
        return this.parsePostfix();
    }

    private parsePostfix(): Expression {
        let expression = this.parsePrimary();
        for (;;) {
            const token = this.peek();
            if (token.kind === 'dot' || token.kind === 'question-dot') {
                this.advance();
                const name = this.expectIdentifier('member name');
                expression = {type: 'MemberExpression', object: expression, name, optional: token.kind === 'question-dot'};
            } else if (token.kind === 'paren-open' && !token.newlineBefore) {
                expression = this.parseInvocation(expression);
            } else if (token.kind === 'less' && !token.spaceBefore) {
                // `f<T>(...)`; anything else is a comparison
                const typeArguments = this.attempt(() => this.parseInvocationTypeArguments());
                if (!typeArguments) {
                    return expression;
                }
                expression = this.parseInvocation(expression, typeArguments);
            } else if (token.kind === 'bracket-open' && !token.newlineBefore) {
                this.advance();
                const index = this.parseExpression();
                this.expect('bracket-close', "']'");
                expression = {type: 'IndexExpression', object: expression, index};
            } else if (token.kind === 'exclamation' && !token.spaceBefore) {
                this.advance();
                expression = {type: 'ForceExpression', expression};
            } else {
                return expression;
            }
        }
    }

    private parseInvocationTypeArguments(): TypeNode[] {
        const typeArguments = this.parseTypeArguments();
        const open = this.peek();
        if (open.kind !== 'paren-open' || open.newlineBefore) {
            return this.fail(open, "'('");
        }
        return typeArguments;
    }

    private parseInvocation(callee: Expression, typeArguments: TypeNode[] = []): InvocationExpression {
        this.expect('paren-open', "'('");
        const args: Argument[] = [];
        while (!this.at('paren-close')) {
            let label: string | undefined;
            if (this.at('identifier') && this.peek(1).kind === 'colon') {
                label = this.advance().text;
                this.advance();
            }
            args.push({label, value: this.parseExpression()});
            if (!this.at('comma')) break;
            this.advance();
        }
        this.expect('paren-close', "')'");
        return {type: 'InvocationExpression', callee, typeArguments, arguments: args};
    }

    private parsePrimary(): Expression {
        const token = this.peek();
        switch (token.kind) {
            case 'identifier':
                this.advance();
                if (token.text === 'true' || token.text === 'false') {
                    return {type: 'BoolLiteral', value: token.text === 'true'};
                }
                if (token.text === 'nil') {
                    return {type: 'NilLiteral'};
                }
                return {type: 'Identifier', name: token.text};
            case 'integer':
                this.advance();
                return {type: 'IntegerLiteral', raw: token.text};
            case 'fixed-point':
                this.advance();
                return {type: 'FixedPointLiteral', raw: token.text};
            case 'string':
                this.advance();
                return {type: 'StringLiteral', raw: token.text};
            case 'paren-open': {
                this.advance();
                const inner = this.parseExpression();
                this.expect('paren-close', "')'");
                return inner;
            }
            case 'bracket-open':
                return {type: 'ArrayLiteral', elements: this.parseList('bracket-close', "']'", () => this.parseExpression())};
            case 'brace-open':
                return {type: 'DictionaryLiteral', entries: this.parseList('brace-close', "'}'", () => this.parseDictionaryEntry())};
            case 'slash': {
                this.advance();
                const domain = this.expectIdentifier('path domain');
                this.expect('slash', "'/'");
                const identifier = this.expectIdentifier('path identifier');
                return {type: 'PathLiteral', domain, identifier};
            }
        }
        return this.fail(token, 'expression');
    }

    private parseDictionaryEntry(): DictionaryEntry {
        const key = this.parseExpression();
        this.expect('colon', "':'");
        return {key, value: this.parseExpression()};
    }

    /** Comma-separated items after an opening token, trailing comma allowed. */
    private parseList<T>(close: TokenKind, closeText: string, item: () => T): T[] {
        this.advance();
        const items: T[] = [];
        while (!this.at(close)) {
            items.push(item());
            if (!this.at('comma')) break;
            this.advance();
        }
        this.expect(close, closeText);
        return items;
    }

    // -----------------------------------------------------------------------
    // Token helpers
    // -----------------------------------------------------------------------

    private peek(offset = 0): ParserToken {
        const i = Math.min(this.index + offset, this.tokens.length - 1);
        return this.tokens[i];
    }

    private advance(): ParserToken {
        const token = this.peek();
        if (this.index < this.tokens.length - 1) this.index++;
        return token;
    }

    private at(kind: TokenKind): boolean {
        return this.peek().kind === kind;
    }

    private atKeyword(word: string): boolean {
        const token = this.peek();
        return token.kind === 'identifier' && token.text === word;
    }

    private skipSemicolons(): void {
        while (this.at('semicolon')) this.advance();
    }

    private expect(kind: TokenKind, what: string): ParserToken {
        const token = this.peek();
        if (token.kind !== kind) {
            return this.fail(token, what);
        }
        return this.advance();
    }

    private expectKeyword(word: string): ParserToken {
        if (!this.atKeyword(word)) {
            return this.fail(this.peek(), `'${word}'`);
        }
        return this.advance();
    }

    private expectIdentifier(what: string): string {
        return this.expect('identifier', what).text;
    }

    /**
     * Run `parse` one level deeper, failing once {@link MAX_NESTING_DEPTH}
     * is reached.
     */
    private nested<T>(parse: () => T): T {
        if (this.depth >= MAX_NESTING_DEPTH) {
            return this.error(this.peek(), NESTING_MESSAGE, 'nesting-depth');
        }
        this.depth++;
        try {
            return parse();
        } finally {
            this.depth--;
        }
    }

    /**
     * Run `parse` speculatively. On a syntax error the position is restored
     * and `undefined` returned.
     */
    private attempt<T>(parse: () => T): T | undefined {
        const start = this.index;
        try {
            return parse();
        } catch (err) {
            if (!(err instanceof ParseError) || err.diagnostic.code === 'nesting-depth') {
                throw err;
            }
            this.index = start;
            return undefined;
        }
    }

    private fail(token: Token, expected: string): never {
        if (token.kind === 'error') {
            return this.error(token, describeInvalidToken(token), 'invalid-token');
        }
        const got = token.kind === 'eof' ? 'end of input' : `'${token.text}'`;
        return this.error(token, `expected ${expected}, got ${got}`, 'unexpected-token');
    }

    private error(token: Token, message: string, code: string): never {
        throw new ParseError({
            line: token.start.line,
            column: token.start.column,
            message,
            severity: 'error',
            code,
        });
    }
}

function describeInvalidToken(token: Token): string {
    if (token.text.startsWith('"')) return 'unterminated string literal';
    if (token.text.startsWith('/*')) return 'unterminated block comment';
    return `unexpected character '${token.text}'`;
}

function isCompositeKind(text: string): text is CompositeKind {
    return COMPOSITE_KINDS.has(text);
}
