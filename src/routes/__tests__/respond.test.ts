import createError from 'http-errors';
import { httpStatusFor, parseBody } from '../respond';
import { AssessRiskBody, MatchConditionsBody, RecommendationsBody } from '../schemas';

describe('respond', () => {
  it('maps tool results to HTTP status codes', () => {
    expect(httpStatusFor({ status: 'success' })).toBe(200);
    expect(httpStatusFor({ status: 'not_found', message: 'gone' })).toBe(404);
    expect(httpStatusFor({ status: 'error', kind: 'validation', message: 'bad' })).toBe(400);
    expect(httpStatusFor({ status: 'error', kind: 'persistence', message: 'disk' })).toBe(500);
  });

  it('returns parsed bodies', () => {
    expect(parseBody(MatchConditionsBody, { symptoms: [] })).toEqual({ symptoms: [] });
  });

  it('reads a missing patient age as 0', () => {
    expect(parseBody(AssessRiskBody, { symptoms: ['cough'], patient: {} })).toEqual({
      symptoms: ['cough'],
      patient: { age: 0 },
    });
  });

  it('accepts care levels outside the known set', () => {
    expect(parseBody(RecommendationsBody, { risk: { careLevel: 'critical' } })).toEqual({
      risk: { careLevel: 'critical' },
      possibleConditions: [],
    });
  });

  it('throws a 400 naming the offending field', () => {
    let caught: unknown;
    try {
      parseBody(AssessRiskBody, { symptoms: ['cough'], patient: { age: 'forty' } });
    } catch (err) {
      caught = err;
    }
    expect(createError.isHttpError(caught)).toBe(true);
    if (!createError.isHttpError(caught)) return;
    expect(caught.status).toBe(400);
    expect(caught.message).toBe('patient.age: Expected number, received string');
  });

  it('treats a missing body as empty', () => {
    expect(() => parseBody(MatchConditionsBody, undefined)).toThrow('symptoms: Required');
  });
});
