/**
 * @file SwitchTower.test.ts
 * @description
 *
 * @license MIT
 * @copyright 2024
 *
 * THE SOFTWARE IS PROVIDED “AS IS”, WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED,
 * INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR
 * PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR COPYRIGHT HOLDERS BE
 * LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT,
 * TORT OR OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE
 * USE OR OTHER DEALINGS IN THE SOFTWARE.
 */

import { describe, test, expect } from 'vitest';
import { CommandLine } from '@/server/switch-tower/CommandLine';
import { HardwareConfig } from '@/server/switch-tower/HardwareConfig';
import { SwitchTower } from '@/server/switch-tower/SwitchTower';
import { InvalidTowerGeometryError } from '@/server/switch-tower/errors';
import { makeExtruder, makeLayer, silentLogger } from '@/__tests__/server/switch-tower/fixtures';

const createTower = (hwConfig = HardwareConfig.PEEK, geometry?: { width?: number; height?: number }) =>
	new SwitchTower(100, 50, silentLogger, hwConfig, geometry);

const commands = (lines: readonly CommandLine[]) => lines.map(([cmd]) => cmd);
const withComment = (lines: readonly CommandLine[], comment: string) => lines.filter(([, c]) => c === comment);

/** A tower that has printed its raft. */
const createTowerAfterRaft = (hwConfig = HardwareConfig.PEEK) => {
	const tower = createTower(hwConfig);
	Array.from(tower.raftLines(makeLayer(0.2), makeExtruder(), true, 9000, 600));
	return tower;
};

const towerParams = (zHop = 0) => ({
	layer: makeLayer(),
	ePos: -2,
	oldExtruder: makeExtruder(),
	newExtruder: makeExtruder({ tool: 1, wipe: 2 }),
	zHop,
	zSpeed: 600,
	xySpeed: 9000,
});

describe('geometry', async () => {
	test('PEEK defaults', () => {
		const tower = createTower();
		expect(tower.width).toEqual(50);
		expect(tower.height).toEqual(14);
		expect(tower.purgeLineLength).toBeCloseTo(50.6);
		expect(tower.purgeLines).toEqual(6);
		expect(tower.wallWidth).toBeCloseTo(52.4);
		expect(tower.wallHeight).toEqual(15);
		expect(tower.raftWidth).toEqual(54);
		expect(tower.raftHeight).toEqual(16);
		expect(tower.prepurgeSign).toEqual(1);
	});

	test('E3D V6 is deeper with one less purge line', () => {
		const tower = createTower(HardwareConfig.E3DV6);
		expect(tower.height).toEqual(16);
		expect(tower.purgeLines).toEqual(6);
		expect(tower.prepurgeSign).toEqual(-1);
	});

	test('odd height', () => {
		expect(() => createTower(HardwareConfig.PEEK, { height: 13 })).toThrow(InvalidTowerGeometryError);
	});

	test('no room for purge lines', () => {
		expect(() => createTower(HardwareConfig.PEEK, { height: 0 })).toThrow(InvalidTowerGeometryError);
	});

	test('initial state', () => {
		const tower = createTower();
		expect(tower.lastTowerZ).toEqual(0);
		expect(tower.flipflopPurge).toStrictEqual(false);
		expect(tower.flipflopInfill).toStrictEqual(false);
	});
});

describe('helpers', async () => {
	test('purge speeds', () => {
		expect(createTower().generatePurgeSpeeds(600)).toEqual([2400, 2400, 2400, 2400, 2400, 2400]);
	});

	test('retraction', () => {
		const tower = createTower();
		expect(tower.getRetraction(-2, makeExtruder())).toBeUndefined();
		expect(tower.getRetraction(-1.9996, makeExtruder())).toBeUndefined();
		expect(tower.getRetraction(-1, makeExtruder({ retract: 3 }))).toEqual(['G1 E-2.0000 F1800.0', ' tower retract']);
		expect(tower.getRetraction(1, makeExtruder())).toEqual(['G1 E-2.0000 F1800.0', ' tower retract']);
	});

	test('z-hop', () => {
		const tower = createTower();
		const layer = makeLayer(0.2);
		expect(tower.getZHop(layer, 0, 600, makeExtruder())).toBeUndefined();
		const extruder = makeExtruder({ zHop: 0.5 });
		expect(tower.getZHop(layer, 0.3, 600, extruder)).toBeUndefined();
		expect(tower.getZHop(layer, 0, 600, extruder)).toEqual(['G1 Z0.500 F600.0', ' z-hop']);
	});

	test('wall position', () => {
		const tower = createTower();
		expect(tower.wallPositionLine(false, 9000)).toEqual(['G1 X98.800 Y64.500 F9000', ' move to purge zone']);
		expect(tower.wallPositionLine(true, 9000)).toEqual(['G1 X98.800 Y49.500 F9000', ' move to purge zone']);
	});

	test('walls', () => {
		const tower = createTower();
		expect(Array.from(tower.wallLines(true, makeExtruder(), 1200, 0.05))).toEqual([
			['G1 X52.400 E2.6200 F1200', ' wall'],
			['G1 Y15.000 E0.7500 F1200', ' wall'],
			['G1 X-52.400 E2.6200 F1200', ' wall'],
			['G1 Y-14.700 E0.7350 F1200', ' wall'],
		]);
		expect(commands(Array.from(tower.wallLines(false, makeExtruder(), 1200, 0.05)))).toEqual([
			'G1 X52.400 E2.6200 F1200',
			'G1 Y-15.000 E0.7500 F1200',
			'G1 X-52.400 E2.6200 F1200',
			'G1 Y14.700 E0.7350 F1200',
		]);
	});
});

describe('raft', async () => {
	test('lines', () => {
		const tower = createTower();
		const lines = Array.from(tower.raftLines(makeLayer(0.2), makeExtruder({ zHop: 0.4 }), true, 9000, 600));
		expect(lines).toHaveLength(125);
		expect(lines.slice(0, 6)).toEqual([
			[null, ' TOWER RAFT START'],
			['G1 Z0.600 F600', ' z-hop'],
			['G1 X97.600 Y48.400 F9000', ' move to raft zone'],
			['G1 Z0.2 F600', ' move z close'],
			['G91', ' relative positioning'],
			['G1 X54.800 E2.7400 F2000', ' raft wall'],
		]);
		expect(withComment(lines, ' raft wall')).toHaveLength(8);
		expect(lines[13]).toEqual(['G1 X0.424 Y-0.424 F9000', null]);
		expect(lines[14]).toEqual(['G1 Y16.000 E1.0400 F1000', ' raft1']);
		expect(lines[15]).toEqual(['G1 X1.000 F1000', ' raft2']);
		expect(withComment(lines, ' raft1')).toHaveLength(27);
		expect(lines.slice(-3)).toEqual([
			['G1 E-2.0000 F1800.0', ' retract'],
			['G90', ' absolute positioning'],
			[null, ' TOWER RAFT END'],
		]);
		expect(tower.lastTowerZ).toEqual(0.2);
	});

	test('without z-hop or retract', () => {
		const tower = createTower();
		const lines = Array.from(tower.raftLines(makeLayer(0.2), makeExtruder(), false, 9000, 600));
		expect(lines).toHaveLength(123);
		expect(lines[1]).toEqual(['G1 X97.600 Y48.400 F9000', ' move to raft zone']);
		expect(lines[lines.length - 2]).toEqual(['G90', ' absolute positioning']);
	});

	test('tower Z is reset to the raft height whatever it was before', () => {
		const tower = createTowerAfterRaft();
		Array.from(tower.towerLines(towerParams()));
		expect(tower.lastTowerZ).toBeCloseTo(0.4);
		Array.from(tower.raftLines(makeLayer(0.2), makeExtruder(), true, 9000, 600));
		expect(tower.lastTowerZ).toEqual(0.2);
	});

	test('tower Z is set once the raft is complete', () => {
		const tower = createTower();
		const gen = tower.raftLines(makeLayer(0.2), makeExtruder(), true, 9000, 600);
		gen.next();
		expect(tower.lastTowerZ).toEqual(0);
		Array.from(gen);
		expect(tower.lastTowerZ).toEqual(0.2);
	});
});

describe('tower', async () => {
	test('PEEK', () => {
		const tower = createTowerAfterRaft();
		const lines = Array.from(tower.towerLines(towerParams()));
		expect(lines).toHaveLength(58);
		expect(lines.slice(0, 6)).toEqual([
			[null, ' TOWER START'],
			['G1 X100.600 Y50.000 F9000', ' move to purge zone'],
			['G1 Z0.400 F600.0', ' move z close'],
			['G91', ' relative positioning'],
			['G1 E1.9000 F1800.0', ' prime'],
			['G1 X50.000 E4.5000 F6000', ' purge trail'],
		]);
		expect(lines[6]).toEqual(['G1 Y1.4 F3000', ' Y shift']);
		expect(lines[17]).toEqual(['T1', ' change tool']);
		expect(lines.slice(18, 24)).toEqual([
			['G1 E125 F1500', ' 25mm/s feed'],
			['G1 X40.000 E2.0000 F1500', ' prime trail'],
			['G1 Y0.900 F3000', ' Y shift'],
			['G1 X-50.600 E3.0360 F2400', ' purge trail'],
			['G1 Y0.600 F3000', ' Y shift'],
			['G1 X50.600 E3.0360 F2400', ' purge trail'],
		]);
		expect(lines.slice(44)).toEqual([
			['G1 Y0.900 F3000', ' Y shift'],
			['G1 X-50.600 E2.0240 F2400', ' purge trail'],
			['G90', ' absolute positioning'],
			['G1 X98.800 Y64.500 F9000', ' move to purge zone'],
			['G91', ' relative positioning'],
			['G1 X52.400 E2.0960 F1200', ' wall'],
			['G1 Y-15.000 E0.6000 F1200', ' wall'],
			['G1 X-52.400 E2.0960 F1200', ' wall'],
			['G1 Y14.700 E0.5880 F1200', ' wall'],
			['G1 E-2.0000 F1800.0', ' retract'],
			['G1 X2.000 F3000', ' wipe'],
			['G90', ' absolute positioning'],
			['G92 E0', ' reset extruder position'],
			[null, ' TOWER END'],
		]);
		expect(withComment(lines, ' purge trail')).toHaveLength(17);
		expect(tower.lastTowerZ).toBeCloseTo(0.4);
		expect(tower.flipflopPurge).toStrictEqual(true);
	});

	test('successive blocks alternate purge zones', () => {
		const tower = createTowerAfterRaft();
		Array.from(tower.towerLines(towerParams()));
		const lines = Array.from(tower.towerLines({ ...towerParams(), layer: makeLayer(0.6) }));
		expect(lines[1]).toEqual(['G1 X99.400 Y50.200 F9000', ' move to purge zone']);
		expect(lines[6]).toEqual(['G1 Y0.6 F3000', ' Y shift']);
		expect(lines[20]).toEqual(['G1 Y0.600 F3000', ' Y shift']);
		expect(tower.lastTowerZ).toBeCloseTo(0.6);
		expect(tower.flipflopPurge).toStrictEqual(false);
	});

	test('E3D V6 purges in reverse with an extra pass', () => {
		const tower = createTowerAfterRaft(HardwareConfig.E3DV6);
		const lines = Array.from(tower.towerLines(towerParams()));
		const trails = commands(withComment(lines, ' purge trail'));
		expect(trails).toHaveLength(19);
		expect(trails[5]).toEqual('G1 X-50.600 E3.0360 F2400');
		expect(trails[6]).toEqual('G1 X50.600 E3.0360 F2400');
		expect(trails.slice(-2)).toEqual(['G1 X-50.600 E2.0240 F2400', 'G1 X50.600 E2.0240 F1200']);
		expect(withComment(lines, ' prime trail')).toEqual([['G1 X-50.000 E5.0000 F900', ' prime trail']]);
		expect(withComment(lines, ' wipe')).toEqual([['G1 X2.000 F3000', ' wipe']]);
	});

	test('retraction before the tower', () => {
		const tower = createTowerAfterRaft();
		const lines = Array.from(tower.towerLines({ ...towerParams(), ePos: 0 }));
		expect(lines[1]).toEqual(['G1 E-2.0000 F1800.0', ' tower retract']);
		expect(lines).toHaveLength(59);
	});

	test('z-hop to the tower', () => {
		const tower = createTowerAfterRaft();
		const lines = Array.from(
			tower.towerLines({ ...towerParams(0.4), oldExtruder: makeExtruder({ zHop: 0.4 }) }),
		);
		expect(withComment(lines, ' z-hop')).toEqual([['G1 Z0.600 F600.0', ' z-hop']]);
		expect(lines[1]).toEqual(['G1 Z0.600 F600.0', ' z-hop']);
	});

	test('flip-flop is unchanged until the block is complete', () => {
		const tower = createTowerAfterRaft();
		const gen = tower.towerLines(towerParams());
		gen.next();
		gen.next();
		expect(tower.flipflopPurge).toStrictEqual(false);
	});
});

describe('infill', async () => {
	const infillParams = () => ({
		layer: makeLayer(),
		ePos: -2,
		extruder: makeExtruder(),
		zHop: 0,
		zSpeed: 600,
		xySpeed: 9000,
	});

	test('PEEK', () => {
		const tower = createTowerAfterRaft();
		const lines = Array.from(tower.infillLines(infillParams()));
		expect(lines).toHaveLength(19);
		expect(lines.slice(0, 6)).toEqual([
			[null, ' TOWER INFILL START'],
			['G1 X98.800 Y64.500 F9000', ' move to purge zone'],
			['G1 Z0.400 F600.0', ' move z close'],
			['G91', ' relative positioning'],
			['G1 E2.0000 F1800.0', ' prime'],
			['G1 X52.400 E2.0960 F2400', ' wall'],
		]);
		expect(lines[6]).toEqual(['G1 Y-15.000 E0.6000 F2400', ' wall']);
		expect(commands(withComment(lines, ' infill'))).toEqual([
			'G1 X8.733 Y-14.700 E0.6839 F2400',
			'G1 X8.733 Y14.700 E0.6839 F2100',
			'G1 X8.733 Y-14.700 E0.6839 F1800',
			'G1 X8.733 Y14.700 E0.6839 F1500',
			'G1 X8.733 Y-14.700 E0.6839 F1200',
			'G1 X8.733 Y14.700 E0.6839 F1200',
		]);
		expect(lines.slice(-4)).toEqual([
			['G1 E-2.0000 F1800.0', ' retract'],
			['G90', ' absolute positioning'],
			['G92 E0', ' reset extruder position'],
			[null, ' TOWER INFILL END'],
		]);
		expect(tower.lastTowerZ).toBeCloseTo(0.4);
		expect(tower.flipflopInfill).toStrictEqual(true);
	});

	test('successive blocks alternate wall orientation', () => {
		const tower = createTowerAfterRaft();
		Array.from(tower.infillLines(infillParams()));
		const lines = Array.from(tower.infillLines({ ...infillParams(), layer: makeLayer(0.6) }));
		expect(lines[1]).toEqual(['G1 X98.800 Y49.500 F9000', ' move to purge zone']);
		expect(lines[2]).toEqual(['G1 Z0.600 F600.0', ' move z close']);
		expect(lines[6]).toEqual(['G1 Y15.000 E0.6000 F2400', ' wall']);
		expect(commands(withComment(lines, ' infill'))[0]).toEqual('G1 X8.733 Y14.700 E0.6839 F2400');
		expect(tower.flipflopInfill).toStrictEqual(false);
	});

	test('wipe follows the last infill pass back', () => {
		const tower = createTowerAfterRaft();
		const lines = Array.from(tower.infillLines({ ...infillParams(), extruder: makeExtruder({ wipe: 1 }) }));
		expect(withComment(lines, ' wipe')).toEqual([['G1 X-0.511 Y-0.860 F2000', ' wipe']]);
	});
});

describe('flip-flops', async () => {
	test('tower and infill blocks flip independently', () => {
		const tower = createTowerAfterRaft();
		Array.from(tower.towerLines(towerParams()));
		expect(tower.flipflopPurge).toStrictEqual(true);
		expect(tower.flipflopInfill).toStrictEqual(false);

		Array.from(
			tower.infillLines({ layer: makeLayer(0.6), ePos: -2, extruder: makeExtruder(), zHop: 0, zSpeed: 600, xySpeed: 9000 }),
		);
		expect(tower.flipflopPurge).toStrictEqual(true);
		expect(tower.flipflopInfill).toStrictEqual(true);

		Array.from(tower.towerLines({ ...towerParams(), layer: makeLayer(0.8) }));
		expect(tower.flipflopPurge).toStrictEqual(false);
		expect(tower.flipflopInfill).toStrictEqual(true);
		expect(tower.lastTowerZ).toBeCloseTo(0.8);
	});
});
