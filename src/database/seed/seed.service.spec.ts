import * as fs from 'fs';
import { DEFAULT_SEED_FILE, parseSeedData } from './seed.service';

const validSeed = {
  genres: ['드라마'],
  actors: [{ firstName: '서연', lastName: '한' }],
  theatreHalls: [{ name: 'Main', rows: 5, seatsInRow: 10 }],
  plays: [{ title: '등대지기', description: '', genres: ['드라마'], actors: [0] }],
  performances: [{ play: 0, theatreHall: 0, showTime: '2026-11-20T10:00:00Z' }],
};

describe('parseSeedData', () => {
  it('올바른 시드를 읽는다', () => {
    // when
    const data = parseSeedData(validSeed);

    // then
    expect(data.theatreHalls[0]).toMatchObject({ name: 'Main', rows: 5, seatsInRow: 10 });
    expect(data.performances).toHaveLength(1);
  });

  it('범위를 벗어난 참조 인덱스는 거부한다', () => {
    expect(() =>
      parseSeedData({
        ...validSeed,
        performances: [{ play: 3, theatreHall: 0, showTime: '2026-11-20T10:00:00Z' }],
      }),
    ).toThrow('Invalid seed data: play index 3 out of range');
  });

  it('genres에 없는 장르 이름을 쓰는 작품은 거부한다', () => {
    expect(() =>
      parseSeedData({
        ...validSeed,
        plays: [{ title: '등대지기', description: '', genres: ['드라마', '뮤지컬'], actors: [0] }],
      }),
    ).toThrow('Invalid seed data: play "등대지기" has unknown genre "뮤지컬"');
  });

  it('상영관 크기가 양수가 아니면 거부한다', () => {
    expect(() =>
      parseSeedData({ ...validSeed, theatreHalls: [{ name: 'Main', rows: 0, seatsInRow: 10 }] }),
    ).toThrow(/^Invalid seed data: /);
  });

  it('저장소에 포함된 기본 시드 파일이 유효하다', () => {
    // given
    const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_SEED_FILE, 'utf-8'));

    // when
    const data = parseSeedData(raw);

    // then
    expect(data.theatreHalls.map((hall) => hall.name)).toContain('Main');
  });
});
