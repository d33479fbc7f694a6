import { expect } from 'chai';
import { createLogger } from '../src/logger';
import { BufferWriter } from '../src/Writer';

describe('createLogger', () => {
    let sink: BufferWriter;

    beforeEach(() => {
        sink = new BufferWriter();
    });

    it('should prefix lines with the logger name and level', () => {
        const logger = createLogger('mdtouch', { sink });
        logger.info('hello');
        logger.warn('careful', { path: 'a.txt' });
        expect(sink.getOutput()).to.equal(
            '[mdtouch] info: hello\n' +
            '[mdtouch] warn: careful {"path":"a.txt"}\n'
        );
    });

    it('should omit the prefix when none is given', () => {
        const logger = createLogger(undefined, { sink });
        logger.error('boom');
        expect(sink.getOutput()).to.equal('error: boom\n');
    });

    it('should drop debug lines unless enabled', () => {
        createLogger('mdtouch', { sink }).debug('hidden');
        expect(sink.getOutput()).to.equal('');

        createLogger('mdtouch', { sink, debug: true }).debug('shown');
        expect(sink.getOutput()).to.equal('[mdtouch] debug: shown\n');
    });
});
