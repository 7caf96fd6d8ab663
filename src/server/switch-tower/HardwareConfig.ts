/**
 * @file HardwareConfig.ts
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

/** A supported hot end / filament path configuration. */
export enum HardwareConfig {
	/** PTFE-lined hot end. */
	PTFE = 'PTFE-PRO-12',
	/** E3D V6 hot end, primes in the negative X direction and needs a taller tower. */
	E3DV6 = 'PTFE-EV6',
	/** All-metal PEEK hot end. */
	PEEK = 'PEEK-PRO-12',
}

export const HW_CONFIGS: readonly HardwareConfig[] = [HardwareConfig.PTFE, HardwareConfig.E3DV6, HardwareConfig.PEEK];

export function isHardwareConfig(value: string): value is HardwareConfig {
	return HW_CONFIGS.some((c) => c === value);
}
