// test/render.spec.ts

import { describe, it, expect } from 'vitest';
import { parseProgram, renderProgram, type RenderOptions } from '../src/ast';

function render(text: string, options: Partial<RenderOptions> = {}): string {
    const { program, diagnostics } = parseProgram(text);
    if (!program) throw new Error(diagnostics.map((d) => d.message).join('\n'));
    return renderProgram(program, options);
}

describe('renderProgram', () => {
    it('separates top-level declarations by a blank line and imports by a line break', () => {
        const text = [
            'import  Token,Other   from 0x01',
            'import "./Util.cdc"',
            'pub contract Hello {',
            '  pub var x: Int',
            '  pub let y: String',
            '  init() { self.x = 0',
            ' self.y = "a" }',
            '}',
        ].join('\n');

        expect(render(text)).toBe([
            'import Token, Other from 0x01',
            'import "./Util.cdc"',
            '',
            'pub contract Hello {',
            '    pub var x: Int',
            '    pub let y: String',
            '',
            '    init() {',
            '        self.x = 0',
            '        self.y = "a"',
            '    }',
            '}',
        ].join('\n'));
    });

    it('prints composite headers, access modifiers and events', () => {
        const text = [
            'pub resource interface Vault: Provider, Receiver {',
            'access(all) let id: UInt64',
            'pub(set) var balance: UFix64',
            'pub event Deposit(amount: UFix64, to: Address?)',
            '}',
        ].join('\n');

        expect(render(text)).toBe([
            'pub resource interface Vault: Provider, Receiver {',
            '    access(all) let id: UInt64',
            '    pub(set) var balance: UFix64',
            '',
            '    pub event Deposit(amount: UFix64, to: Address?)',
            '}',
        ].join('\n'));
    });

    it('leaves an empty body on a line of its own', () => {
        expect(render('pub fun main() {}')).toBe('pub fun main() {\n\n}');
    });

    it('prints type annotations', () => {
        const text = 'fun f(from account: AuthAccount, refs: [&Vault], map: {String: @R?}): auth &R? {}';
        expect(render(text, { maxLineWidth: 120 })).toBe(
            'fun f(from account: AuthAccount, refs: [&Vault], map: {String: @R?}): auth &R? {\n\n}',
        );
    });

    it('adds only the parentheses precedence requires', () => {
        const text = [
            'let a = (x + y) * z',
            'let b = x - (y - z)',
            'let c = (x - y) - z',
            'let d = x ?? (y ?? z)',
            'let e = -(x + y)',
            'let f = (!ok)',
        ].join('\n');

        expect(render(text)).toBe([
            'let a = (x + y) * z',
            '',
            'let b = x - (y - z)',
            '',
            'let c = x - y - z',
            '',
            'let d = x ?? y ?? z',
            '',
            'let e = -(x + y)',
            '',
            'let f = !ok',
        ].join('\n'));
    });

    it('prints postfix chains, casts, paths and literals', () => {
        const text = [
            'let a = v?.b!.c[0]',
            'let b = &vault as! &Vault',
            'let c = /storage/vault',
            'let d = [1, 2,]',
            'let e = {"k": 1}',
            'let f: [Int] = []',
            'let g <- create R(owner: acct)',
            'let h = ok ? 1 : 2',
        ].join('\n');

        expect(render(text).split('\n\n')).toEqual([
            'let a = v?.b!.c[0]',
            'let b = &vault as! &Vault',
            'let c = /storage/vault',
            'let d = [1, 2]',
            'let e = {"k": 1}',
            'let f: [Int] = []',
            'let g <- create R(owner: acct)',
            'let h = ok ? 1 : 2',
        ]);
    });

    it('prints nested statements one level deeper per block', () => {
        const text = [
            'fun f() {',
            'if let x = y { return } else if z { while a { break } } else { emit E(v: 1) }',
            'for item in items { total = total + item }',
            'a <-> b',
            '}',
        ].join('\n');

        expect(render(text)).toBe([
            'fun f() {',
            '    if let x = y {',
            '        return',
            '    } else if z {',
            '        while a {',
            '            break',
            '        }',
            '    } else {',
            '        emit E(v: 1)',
            '    }',
            '    for item in items {',
            '        total = total + item',
            '    }',
            '    a <-> b',
            '}',
        ].join('\n'));
    });

    it('breaks arguments one per line when they do not fit', () => {
        const text = 'fun f() {\n    let total = compute(alpha, beta, gamma)\n}';
        expect(render(text, { maxLineWidth: 30 })).toBe([
            'fun f() {',
            '    let total = compute(',
            '        alpha,',
            '        beta,',
            '        gamma',
            '    )',
            '}',
        ].join('\n'));
    });

    it('breaks a binary expression after the operator', () => {
        expect(render('let x = aaaa + bbbb', { maxLineWidth: 16 })).toBe('let x = aaaa +\n    bbbb');
    });

    it('indents with the configured unit', () => {
        expect(render('fun f() { return }', { indentUnit: '  ' })).toBe('fun f() {\n  return\n}');
        expect(render('fun f() { return }', { indentUnit: '\t' })).toBe('fun f() {\n\treturn\n}');
    });

    it('prints a transaction with its phases', () => {
        const text = [
            'transaction(amount: UFix64) {',
            'let vault: @Vault',
            'prepare(signer: AuthAccount) { self.vault <- signer.withdraw(amount: amount) }',
            'pre { amount > 0.0: "positive" }',
            'execute { deposit(<-self.vault) }',
            'post { done }',
            '}',
        ].join('\n');

        expect(render(text)).toBe([
            'transaction(amount: UFix64) {',
            '    let vault: @Vault',
            '',
            '    prepare(signer: AuthAccount) {',
            '        self.vault <- signer.withdraw(amount: amount)',
            '    }',
            '',
            '    pre {',
            '        amount > 0.0: "positive"',
            '    }',
            '',
            '    execute {',
            '        deposit(<-self.vault)',
            '    }',
            '',
            '    post {',
            '        done',
            '    }',
            '}',
        ].join('\n'));
    });

    it('prints function conditions ahead of the statements', () => {
        const text = 'fun f(x: Int): Int { pre { x > 0: "positive" } return x }';
        expect(render(text)).toBe([
            'fun f(x: Int): Int {',
            '    pre {',
            '        x > 0: "positive"',
            '    }',
            '    return x',
            '}',
        ].join('\n'));
    });

    it('keeps enum cases on consecutive lines', () => {
        expect(render('pub enum Color: UInt8 { pub case red; pub case green }')).toBe(
            'pub enum Color: UInt8 {\n    pub case red\n    pub case green\n}',
        );
    });

    it('indents switch cases and their statements', () => {
        const text = 'fun f(x: Int) { switch x { case 1: a() default: b(); return } }';
        expect(render(text)).toBe([
            'fun f(x: Int) {',
            '    switch x {',
            '        case 1:',
            '            a()',
            '        default:',
            '            b()',
            '            return',
            '    }',
            '}',
        ].join('\n'));
    });

    it('prints type arguments and the remaining type forms', () => {
        const text = [
            'let r = acct.borrow<&R{I}>(from: /storage/r)',
            'let c: Capability<&{A.B}> = acct.getCapability<&{A.B}>(/public/x)',
            'let f: ((Int, String): Bool) = g',
        ].join('\n');

        expect(render(text).split('\n\n')).toEqual([
            'let r = acct.borrow<&R{I}>(from: /storage/r)',
            'let c: Capability<&{A.B}> = acct.getCapability<&{A.B}>(/public/x)',
            'let f: ((Int, String): Bool) = g',
        ]);
    });
});
