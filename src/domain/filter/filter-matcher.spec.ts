import { FilterMatcher, parseEqualityFilter } from './filter-matcher';

describe('parseEqualityFilter', () => {
  it('should parse a double-quoted value', () => {
    expect(parseEqualityFilter('userName eq "alice"')).toEqual({ attribute: 'userName', value: 'alice' });
  });

  it('should parse a single-quoted value', () => {
    expect(parseEqualityFilter("displayName eq 'Eng Team'")).toEqual({
      attribute: 'displayName',
      value: 'Eng Team',
    });
  });

  it('should parse an unquoted value', () => {
    expect(parseEqualityFilter('active eq false')).toEqual({ attribute: 'active', value: 'false' });
  });

  it('should accept the operator keyword in any case and surrounding whitespace', () => {
    expect(parseEqualityFilter('  userName EQ "bob"  ')).toEqual({ attribute: 'userName', value: 'bob' });
  });

  it.each([
    '',
    'userName',
    'userName co "ali"',
    'userName eq "a" and active eq true',
    'name.givenName eq "Alice"',
    'eq "x"',
    'userName eq',
  ])('should return null for unsupported filter %p', (filter) => {
    expect(parseEqualityFilter(filter)).toBeNull();
  });

  it('should return null for undefined', () => {
    expect(parseEqualityFilter(undefined)).toBeNull();
  });
});

describe('FilterMatcher', () => {
  const resources = [
    { id: '1', userName: 'alice', active: true },
    { id: '2', userName: 'Alice', active: false },
    { id: '3', userName: 'bob', active: true },
  ];

  it('should match case-sensitively on the value', () => {
    const matcher = new FilterMatcher('userName eq "alice"');
    expect(matcher.apply(resources, (r) => r).map((r) => r.id)).toEqual(['1']);
  });

  it('should match case-sensitively on the attribute name', () => {
    const matcher = new FilterMatcher('username eq "alice"');
    expect(matcher.isActive).toBe(true);
    expect(matcher.apply(resources, (r) => r)).toEqual([]);
  });

  it('should compare booleans by their text form', () => {
    const matcher = new FilterMatcher('active eq false');
    expect(matcher.apply(resources, (r) => r).map((r) => r.id)).toEqual(['2']);
  });

  it('should pass everything through for an unparseable filter', () => {
    const matcher = new FilterMatcher('userName sw "a"');
    expect(matcher.isActive).toBe(false);
    expect(matcher.apply(resources, (r) => r)).toHaveLength(3);
  });

  it('should not match when the attribute is absent', () => {
    const matcher = new FilterMatcher('externalId eq "x"');
    expect(matcher.matches({ id: '1' })).toBe(false);
  });

  it('should not match structured values', () => {
    const matcher = new FilterMatcher('name eq "Alice"');
    expect(matcher.matches({ name: { givenName: 'Alice' } })).toBe(false);
  });
});
