/**
 * @file fixtures.ts
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

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { pino } from 'pino';
import { ExtruderProfile, ExtruderProfileOptions } from '@/server/switch-tower/Extruder';
import { LayerInfo } from '@/server/switch-tower/Layer';

export const silentLogger = pino({ level: 'silent' });

/** An extruder with a round feed rate of 0.05 mm of filament per mm of travel. */
export class TestExtruder extends ExtruderProfile {
	getFeedRate(multiplier = 1): number {
		return 0.05 * multiplier;
	}
}

export const makeExtruder = (opts: Partial<ExtruderProfileOptions> = {}) =>
	new TestExtruder({ tool: 0, retract: 2, retractSpeed: 1800, ...opts });

/** Layer 0.2 thick, slowest outer perimeter at 1200 mm/min with a feed rate of 0.04. */
export const makeLayer = (z = 0.4, height = 0.2) => new LayerInfo(height, z, 1200, 0.04);

export const towerJobFile = fileURLToPath(new URL('../../fixtures/tower-job.json', import.meta.url));

export const readTowerJob = (): unknown => JSON.parse(readFileSync(towerJobFile, 'utf8'));
