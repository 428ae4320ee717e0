import { InvalidArgumentError } from 'commander';

export function parseIntArg(min: number): (value: string) => number {
    return (value) => {
        const n = Number(value);
        if (!Number.isInteger(n) || n < min) throw new InvalidArgumentError(`expected an integer >= ${min}`);
        return n;
    };
}
