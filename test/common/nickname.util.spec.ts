import {
    generateNickname,
    NICKNAME_PATTERN,
} from '../../src/common/utils/nickname.util';

describe('generateNickname', () => {
    it('builds adjective_animal_number nicknames', () => {
        for (let i = 0; i < 20; i++) {
            const nickname = generateNickname();

            expect(nickname).toMatch(/^[a-z]+_[a-z]+_\d{1,3}$/);
            expect(NICKNAME_PATTERN.test(nickname)).toBe(true);
        }
    });
});

describe('NICKNAME_PATTERN', () => {
    it.each(['jane_doe', 'jane-doe', 'Jane42'])('accepts %s', (nickname) => {
        expect(NICKNAME_PATTERN.test(nickname)).toBe(true);
    });

    it.each(['jane doe', 'jane!', 'jané'])('rejects %s', (nickname) => {
        expect(NICKNAME_PATTERN.test(nickname)).toBe(false);
    });
});
