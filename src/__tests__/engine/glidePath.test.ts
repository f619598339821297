import {
  DEFAULT_GLIDE_PATH,
  GLIDE_PATHS,
  getAllGlidePaths,
  getGlidePath,
  getGlidePathFractions,
  selectGlidePath,
} from '../../engine/glidePath';

describe('GLIDE_PATHS', () => {
  it('should have percentages summing to 100 for every entry and the default', () => {
    for (const path of getAllGlidePaths()) {
      expect(path.bondPct + path.internationalPct + path.nationalPct).toBe(100);
    }
  });

  it('should have fractions summing to 1.0', () => {
    for (const path of getAllGlidePaths()) {
      const [bond, international, national] = getGlidePathFractions(path);
      expect(bond + international + national).toBeCloseTo(1.0, 10);
    }
  });

  it('should list target dates 2020 through 2090 in order', () => {
    expect(GLIDE_PATHS.map((path) => path.key)).toEqual([
      '2020', '2030', '2040', '2050', '2060', '2070', '2080', '2090',
    ]);
  });

  it('should increase the bond share with each later date', () => {
    for (let i = 1; i < GLIDE_PATHS.length; i++) {
      expect(GLIDE_PATHS[i].bondPct).toBeGreaterThan(GLIDE_PATHS[i - 1].bondPct);
    }
  });
});

describe('selectGlidePath', () => {
  it('should select the path whose token appears in the label', () => {
    const path = selectGlidePath('Portfolio_Positions_2030.csv');
    expect(path.key).toBe('2030');
    expect(path.bondPct).toBe(30);
    expect(path.internationalPct).toBe(27);
    expect(path.nationalPct).toBe(43);
  });

  it('should match the token anywhere in the label', () => {
    expect(selectGlidePath('roth-2090-export.csv').key).toBe('2090');
  });

  it('should fall back to all bonds when no token matches', () => {
    const path = selectGlidePath('Portfolio_Positions.csv');
    expect(path).toBe(DEFAULT_GLIDE_PATH);
    expect(path.bondPct).toBe(100);
    expect(path.internationalPct).toBe(0);
    expect(path.nationalPct).toBe(0);
  });

  it('should not match a partial token', () => {
    expect(selectGlidePath('positions_202.csv').key).toBe('default');
  });

  it('should take the first match in table order', () => {
    expect(selectGlidePath('2080_and_2040.csv').key).toBe('2040');
  });
});

describe('getGlidePath', () => {
  it('should look up paths by key', () => {
    expect(getGlidePath('2060')?.bondPct).toBe(60);
    expect(getGlidePath('default')).toBe(DEFAULT_GLIDE_PATH);
  });

  it('should return null for unknown keys', () => {
    expect(getGlidePath('2100')).toBeNull();
  });
});
