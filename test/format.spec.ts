import { expect } from 'chai';
import {
	cellRepr,
	cellToString,
	compileFormatter,
	guessFormatFor,
	interpolate,
	registerFormatter,
} from '../src/util/format.js';
import { FLOAT_TYPE, INT_TYPE, LIST_TYPE, OBJECT_TYPE, STR_TYPE } from '../src/types/builtin-types.js';
import { SchemaError } from '../src/common/errors.js';
import { Blob } from '../src/types/blob.js';

describe('Formats', () => {
	describe('interpolate', () => {
		it('should format numbers with width, precision and flags', () => {
			expect(interpolate('%5.2f', 3.14159)).to.equal(' 3.14');
			expect(interpolate('%-5d|', 42)).to.equal('42   |');
			expect(interpolate('%05d', -42)).to.equal('-0042');
			expect(interpolate('%d', 7.9)).to.equal('7');
			expect(interpolate('%x', 255)).to.equal('ff');
			expect(interpolate('%X', -255)).to.equal('-FF');
			expect(interpolate('%d', 12345678901234567890n)).to.equal('12345678901234567890');
		});

		it('should format exponents with two digits', () => {
			expect(interpolate('%e', 12345.678)).to.equal('1.234568e+04');
			expect(interpolate('%.2E', 0.000123)).to.equal('1.23E-04');
		});

		it('should pick fixed or exponent notation for %g', () => {
			expect(interpolate('%g', 0.0001)).to.equal('0.0001');
			expect(interpolate('%g', 1234567)).to.equal('1.23457e+06');
			expect(interpolate('%g', 100)).to.equal('100');
			expect(interpolate('%.3g', 2.5)).to.equal('2.5');
		});

		it('should render special floats', () => {
			expect(interpolate('%.2f', NaN)).to.equal('nan');
			expect(interpolate('%f', -Infinity)).to.equal('-inf');
		});

		it('should render text and repr forms', () => {
			expect(interpolate('%s', null)).to.equal('None');
			expect(interpolate('%r', 'a')).to.equal("'a'");
			expect(interpolate('<%s>', true)).to.equal('<True>');
			expect(interpolate('%5s', 'ab')).to.equal('   ab');
			expect(interpolate('100%% %d', 3)).to.equal('100% 3');
		});

		it('should need exactly one conversion', () => {
			expect(() => interpolate('%%d', 1)).to.throw(TypeError);
			expect(() => interpolate('%d %d', 1)).to.throw(TypeError);
			expect(() => interpolate('%d', 'text')).to.throw(TypeError);
		});
	});

	describe('cell text', () => {
		it('should render plain values', () => {
			expect(cellToString(null)).to.equal('None');
			expect(cellToString(false)).to.equal('False');
			expect(cellToString(1.5)).to.equal('1.5');
			expect(cellToString(Infinity)).to.equal('inf');
			expect(cellToString(3n)).to.equal('3');
			expect(cellToString('a')).to.equal('a');
		});

		it('should render containers with quoted elements', () => {
			expect(cellToString([1, 'a', null])).to.equal("[1, 'a', None]");
			expect(cellToString({ k: 1, s: 'v' })).to.equal("{'k': 1, 's': 'v'}");
			expect(cellToString(new Uint8Array([1, 255]))).to.equal("b'01ff'");
			expect(cellRepr("it's")).to.equal("'it\\'s'");
		});

		it('should render hashable objects by their own text', () => {
			expect(cellToString(new Blob(new Uint8Array(3), 'PNG'))).to.equal('<Blob PNG 3 bytes>');
		});
	});

	describe('compileFormatter', () => {
		it('should hide columns without a format', () => {
			expect(compileFormatter(null)(5)).to.equal(null);
		});

		it('should render missing values as a dash', () => {
			expect(compileFormatter('%d')(null)).to.equal('-');
			expect(compileFormatter('minutes')(null)).to.equal('-');
		});

		it('should render values that do not fit as empty text', () => {
			expect(compileFormatter('%d')('abc')).to.equal('');
		});

		it('should render seconds as minutes', () => {
			expect(compileFormatter('minutes')(90)).to.equal('1.50m');
		});

		it('should use registered formatters', () => {
			registerFormatter('upper', value => cellToString(value).toUpperCase());
			expect(compileFormatter('upper')('abc')).to.equal('ABC');
			expect(() => registerFormatter('%bad', value => cellToString(value))).to.throw(SchemaError);
		});

		it('should reject unknown formatter names', () => {
			expect(() => compileFormatter('nope')).to.throw(SchemaError, "unknown column format 'nope'");
		});

		it('should render object ids in hex', () => {
			const list = [1];
			const formatter = compileFormatter('hexId');
			expect(formatter(list)).to.equal(formatter(list));
			expect(formatter(255)).to.equal('ff');
		});
	});

	describe('guessFormatFor', () => {
		it('should derive formats from name and type', () => {
			expect(guessFormatFor('mz', INT_TYPE)).to.equal('%.5f');
			expect(guessFormatFor('mzmin', FLOAT_TYPE)).to.equal('%.5f');
			expect(guessFormatFor('rtmin', FLOAT_TYPE)).to.equal('minutes');
			expect(guessFormatFor('intensity', FLOAT_TYPE)).to.equal('%.2f');
			expect(guessFormatFor('id', INT_TYPE)).to.equal('%d');
			expect(guessFormatFor('mass_name', STR_TYPE)).to.equal('%s');
			expect(guessFormatFor('x', LIST_TYPE)).to.equal('%r');
			expect(guessFormatFor('x', OBJECT_TYPE)).to.equal('%r');
		});
	});
});
