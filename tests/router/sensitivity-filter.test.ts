import { describe, it, expect } from 'vitest';
import { findSensitiveTerms, isSensitive } from '../../src/agent/router/sensitivity-filter.js';

describe('Sensitivity Filter', () => {
  it('flags every listed term it finds', () => {
    expect(findSensitiveTerms('cual es mi contrasena del banco')).toEqual(['contrasena', 'banco']);
  });

  it('matches regardless of case', () => {
    expect(isSensitive('Mi PASSWORD es secreta')).toBe(true);
  });

  it('matches the accented spelling', () => {
    expect(findSensitiveTerms('olvidé mi contraseña')).toEqual(['contraseña']);
  });

  it('matches multi-word terms', () => {
    expect(isSensitive('necesito mi numero de seguro social')).toBe(true);
  });

  it('matches inside longer words', () => {
    expect(findSensitiveTerms('classnote')).toEqual(['ssn']);
  });

  it('does not flag ordinary care questions', () => {
    expect(isSensitive('a que hora es mi cita')).toBe(false);
    expect(isSensitive('')).toBe(false);
  });

  it('accepts a custom term list', () => {
    expect(isSensitive('mi pin es 1234', ['pin'])).toBe(true);
    expect(isSensitive('mi tarjeta', ['pin'])).toBe(false);
  });
});
