import { describe, it, expect } from 'vitest';
import { abstractQuery, templatesEqual } from './template.js';
import { ParseError } from '../../types/errors.js';

function template(sql: string): string {
  return abstractQuery(sql).text;
}

function sameSkeleton(a: string, b: string): boolean {
  return templatesEqual(abstractQuery(a), abstractQuery(b));
}

describe('abstractQuery', () => {
  describe('placeholders', () => {
    it('should replace tables, columns and literals', () => {
      expect(template("SELECT COUNT(*) FROM schools WHERE county = 'X'")).toBe(
        'SELECT COUNT(*) FROM <TABLE> WHERE <COL> = <STR>'
      );
    });

    it('should treat double-quoted text after a comparison as a string literal', () => {
      expect(template('SELECT count(*) FROM institutions AS i WHERE i.county = "Y"')).toBe(
        'SELECT COUNT(*) FROM <TABLE> WHERE <COL> = <STR>'
      );
    });

    it('should treat double-quoted text in a name position as an identifier', () => {
      expect(template('SELECT "name" FROM singer')).toBe('SELECT <COL> FROM <TABLE>');
      expect(template('SELECT "s"."name" FROM "singer" AS "s" WHERE "s"."country" LIKE "Fr%"')).toBe(
        'SELECT <COL> FROM <TABLE> WHERE <COL> LIKE <STR>'
      );
    });

    it('should treat double-quoted items of an IN list and BETWEEN bounds as literals', () => {
      expect(template('SELECT a FROM t WHERE b IN ("x", "y")')).toBe('SELECT <COL> FROM <TABLE> WHERE <COL> IN (<STR>, <STR>)');
      expect(template('SELECT a FROM t WHERE d BETWEEN "2020" AND "2021"')).toBe(
        'SELECT <COL> FROM <TABLE> WHERE <COL> BETWEEN <STR> AND <STR>'
      );
    });

    it('should tag numbers', () => {
      expect(template('SELECT name FROM singer WHERE age > 30.5')).toBe('SELECT <COL> FROM <TABLE> WHERE <COL> > <NUM>');
    });

    it('should turn qualified names into one column placeholder', () => {
      expect(
        template('SELECT T1.name FROM singer AS T1 JOIN concert AS T2 ON T1.id = T2.singer_id WHERE T2.year = 2014')
      ).toBe('SELECT <COL> FROM <TABLE> JOIN <TABLE> ON <COL> = <COL> WHERE <COL> = <NUM>');
    });

    it('should keep a qualified star as *', () => {
      expect(template('SELECT t.* FROM items AS t')).toBe('SELECT * FROM <TABLE>');
    });

    it('should tag every table of a comma-separated FROM list', () => {
      expect(template('SELECT a FROM t1, t2')).toBe('SELECT <COL> FROM <TABLE>, <TABLE>');
    });

    it('should tag a table listed after a join condition', () => {
      expect(template('SELECT t1.a FROM t1 JOIN t2 ON t1.id = t2.id, t3 WHERE t3.b IN (1, 2)')).toBe(
        'SELECT <COL> FROM <TABLE> JOIN <TABLE> ON <COL> = <COL>, <TABLE> WHERE <COL> IN (<NUM>, <NUM>)'
      );
    });

    it('should treat bracketed and backticked names as identifiers', () => {
      expect(template('SELECT [first name] FROM `order items`')).toBe('SELECT <COL> FROM <TABLE>');
    });

    it('should tag bound parameters', () => {
      expect(template('SELECT a FROM t WHERE b = ? AND c = :name')).toBe(
        'SELECT <COL> FROM <TABLE> WHERE <COL> = <PARAM> AND <COL> = <PARAM>'
      );
    });
  });

  describe('aliases', () => {
    it('should drop bare table aliases', () => {
      expect(template('SELECT s.name FROM singer s WHERE s.age > 30')).toBe(
        'SELECT <COL> FROM <TABLE> WHERE <COL> > <NUM>'
      );
    });

    it('should drop bare column aliases after a call', () => {
      expect(template('SELECT COUNT(*) total FROM t')).toBe('SELECT COUNT(*) FROM <TABLE>');
    });

    it('should drop AS aliases', () => {
      expect(template('SELECT MAX(price) AS top FROM items')).toBe('SELECT MAX(<COL>) FROM <TABLE>');
    });
  });

  describe('structure', () => {
    it('should keep subqueries', () => {
      expect(template('SELECT name FROM singer WHERE id IN (SELECT singer_id FROM concert)')).toBe(
        'SELECT <COL> FROM <TABLE> WHERE <COL> IN (SELECT <COL> FROM <TABLE>)'
      );
    });

    it('should keep grouping and aggregates', () => {
      expect(template('SELECT dept, COUNT(*) FROM emp GROUP BY dept HAVING COUNT(*) > 2')).toBe(
        'SELECT <COL>, COUNT(*) FROM <TABLE> GROUP BY <COL> HAVING COUNT(*) > <NUM>'
      );
    });

    it('should keep cast target types', () => {
      expect(template('SELECT CAST(price AS REAL) FROM items')).toBe('SELECT CAST(<COL> AS REAL) FROM <TABLE>');
    });

    it('should keep join types', () => {
      expect(template('SELECT a.x FROM a LEFT JOIN b ON a.id = b.id')).toBe(
        'SELECT <COL> FROM <TABLE> LEFT JOIN <TABLE> ON <COL> = <COL>'
      );
    });

    it('should ignore a trailing semicolon and comments', () => {
      expect(template('SELECT a -- the column\nFROM t /* table */;')).toBe('SELECT <COL> FROM <TABLE>');
    });
  });

  describe('equivalence', () => {
    it('should match queries that differ only in names and literals', () => {
      expect(
        sameSkeleton("SELECT COUNT(*) FROM schools WHERE county = 'X'", "SELECT COUNT(*) FROM institutions WHERE region = 'North'")
      ).toBe(true);
    });

    it('should match quoted and bare identifiers', () => {
      expect(sameSkeleton('SELECT "name" FROM "singer"', 'SELECT name FROM singer')).toBe(true);
    });

    it('should ignore identifier and keyword casing', () => {
      expect(sameSkeleton('select NAME from Singer where Age = 5', 'SELECT name FROM singer WHERE age = 7')).toBe(true);
    });

    it('should normalize != and <>', () => {
      expect(sameSkeleton('SELECT a FROM t WHERE b != 1', 'SELECT a FROM t WHERE b <> 2')).toBe(true);
    });

    it('should tell apart different sort directions', () => {
      expect(
        sameSkeleton('SELECT name FROM singer ORDER BY age DESC LIMIT 1', 'SELECT name FROM singer ORDER BY age ASC LIMIT 1')
      ).toBe(false);
    });

    it('should tell apart different aggregates', () => {
      expect(sameSkeleton('SELECT MAX(age) FROM singer', 'SELECT MIN(age) FROM singer')).toBe(false);
    });

    it('should be deterministic', () => {
      const sql = 'SELECT a, b FROM t WHERE c IN (SELECT d FROM u WHERE e LIKE \'%x%\') ORDER BY a';
      expect(abstractQuery(sql)).toEqual(abstractQuery(sql));
    });
  });

  describe('errors', () => {
    it('should reject unknown characters with their offset', () => {
      expect(() => abstractQuery('SELECT a FROM t WHERE a = #')).toThrow('Unexpected character "#" (at offset 26)');
    });

    it('should reject a trailing comma', () => {
      expect(() => abstractQuery('SELECT a, FROM t')).toThrow('Trailing comma (at offset 8)');
    });

    it('should reject multiple statements', () => {
      expect(() => abstractQuery('SELECT 1; DROP TABLE t')).toThrow(
        'Multiple statements are not supported (at offset 10)'
      );
    });

    it('should reject unclosed parentheses', () => {
      expect(() => abstractQuery('SELECT COUNT(* FROM t')).toThrow('Unclosed "(" (at offset 12)');
    });

    it('should reject statements that are not queries', () => {
      expect(() => abstractQuery('DELETE FROM t')).toThrow(ParseError);
    });

    it('should reject empty input', () => {
      expect(() => abstractQuery('  ')).toThrow('Query is empty');
    });

    it('should reject an empty SELECT list', () => {
      expect(() => abstractQuery('SELECT FROM t')).toThrow('SELECT list is empty');
    });
  });
});
