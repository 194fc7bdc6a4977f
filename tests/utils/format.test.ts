import { describe, it, expect } from 'vitest';
import { formatMillionIsk, formatThousandM3, routeName, solarSystemName } from '../../src/utils/format.js';

describe('formatMillionIsk', () => {
  it('should round to whole millions with separators', () => {
    expect(formatMillionIsk(12_500_000)).toBe('13 M ISK');
    expect(formatMillionIsk(1_250_000_000)).toBe('1,250 M ISK');
    expect(formatMillionIsk(0)).toBe('0 M ISK');
  });
});

describe('formatThousandM3', () => {
  it('should round to whole thousands', () => {
    expect(formatThousandM3(12_500)).toBe('13 K m3');
    expect(formatThousandM3(320_000)).toBe('320 K m3');
  });
});

describe('solarSystemName', () => {
  it('should take the first word of the location name', () => {
    expect(solarSystemName({ name: 'Jita IV - Moon 4 - Caldari Navy Assembly Plant' })).toBe('Jita');
    expect(solarSystemName({ name: 'Perimeter' })).toBe('Perimeter');
  });
});

describe('routeName', () => {
  it('should join both systems', () => {
    expect(routeName({ name: 'Jita IV - Moon 4' }, { name: 'Amarr VIII (Oris)' })).toBe('Jita - Amarr');
  });

  it('should mark missing locations', () => {
    expect(routeName(null, undefined)).toBe('? - ?');
  });
});
