import { randomInt } from 'crypto';

const ADJECTIVES = [
    'clever',
    'jolly',
    'brave',
    'sly',
    'gentle',
    'quiet',
    'swift',
    'bold',
    'calm',
    'eager',
];

const ANIMALS = [
    'panda',
    'fox',
    'raccoon',
    'koala',
    'lion',
    'otter',
    'heron',
    'badger',
    'lynx',
    'owl',
];

export const NICKNAME_PATTERN = /^[\w-]+$/;

/**
 * Random `adjective_animal_NNN` nickname. Uniqueness is the caller's concern.
 */
export function generateNickname(): string {
    const adjective = ADJECTIVES[randomInt(ADJECTIVES.length)];
    const animal = ANIMALS[randomInt(ANIMALS.length)];
    return `${adjective}_${animal}_${randomInt(1000)}`;
}
