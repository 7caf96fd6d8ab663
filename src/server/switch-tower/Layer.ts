/**
 * @file Layer.ts
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

export interface Layer {
	readonly height: number;
	/** Z of the object layer currently being printed. */
	readonly z: number;
	/** Returns the slowest outer perimeter speed (mm/min) on the layer and its feed rate. */
	getOuterPerimeterRates(): [minSpeed: number, feedRate: number];
}

export class LayerInfo implements Layer {
	constructor(
		public readonly height: number,
		public readonly z: number,
		public readonly outerPerimeterSpeed: number,
		public readonly outerPerimeterFeedRate: number,
	) {}

	getOuterPerimeterRates(): [minSpeed: number, feedRate: number] {
		return [this.outerPerimeterSpeed, this.outerPerimeterFeedRate];
	}
}
