import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    BUILD_INFO_FILE,
    DEFAULT_BUILD_DATETIME,
    readBuildInfo,
    resolveBuildInfo,
    writeBuildInfo,
} from '../src/buildInfo';

describe('buildInfo', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdtouch-build-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('resolveBuildInfo', () => {
        it('should fall back to the default build datetime', () => {
            expect(resolveBuildInfo({})).to.deep.equal({ buildDatetime: DEFAULT_BUILD_DATETIME });
            expect(DEFAULT_BUILD_DATETIME).to.equal('2025-02-03 10:00:00');
        });

        it('should treat a blank build datetime as unset', () => {
            expect(resolveBuildInfo({ BUILD_DATETIME: '   ' }).buildDatetime).to.equal(DEFAULT_BUILD_DATETIME);
        });

        it('should trim the build datetime', () => {
            expect(resolveBuildInfo({ BUILD_DATETIME: ' 2026-03-04 05:06:07 ' }).buildDatetime)
                .to.equal('2026-03-04 05:06:07');
        });
    });

    describe('writeBuildInfo', () => {
        it('should stamp the builder environment into the output directory', () => {
            const outDir = path.join(tmpDir, 'dist');

            const written = writeBuildInfo(outDir, { BUILD_DATETIME: '2026-10-18 09:30:00' });

            expect(written).to.equal(path.join(outDir, BUILD_INFO_FILE));
            expect(fs.readFileSync(written, 'utf8')).to.equal(
                '{\n  "buildDatetime": "2026-10-18 09:30:00"\n}\n'
            );
            expect(readBuildInfo(written)).to.deep.equal({ buildDatetime: '2026-10-18 09:30:00' });
        });
    });

    describe('readBuildInfo', () => {
        it('should return the default when nothing was stamped', () => {
            expect(readBuildInfo(path.join(tmpDir, BUILD_INFO_FILE)))
                .to.deep.equal({ buildDatetime: DEFAULT_BUILD_DATETIME });
        });

        it('should reject malformed JSON', () => {
            const file = path.join(tmpDir, BUILD_INFO_FILE);
            fs.writeFileSync(file, '{bad');
            expect(() => readBuildInfo(file)).to.throw(Error, `cannot read ${file}: `);
        });

        it('should reject a stamp without a datetime', () => {
            const file = path.join(tmpDir, BUILD_INFO_FILE);
            fs.writeFileSync(file, '{"buildDatetime": ""}');
            expect(() => readBuildInfo(file)).to.throw(Error, `invalid ${file}: buildDatetime `);
        });
    });
});
