import {
  CompositeLayer,
  type UpdateParameters,
  type GetPickingInfoParams,
  type DefaultProps,
} from "@deck.gl/core";
import { ScatterplotLayer, TextLayer } from "@deck.gl/layers";
import type { Table } from "apache-arrow";
import { PinClusterEngine, pinsFromTable, viewportFromBounds } from "pin-cluster";
import {
  computeFillColors,
  computeLabelSizes,
  computeOutlineWidths,
  computePositions,
  computeRadii,
  computeTexts,
} from "./style-helpers";
import { resolvePickingInfo } from "./picking";
import type {
  ColorRGBA,
  PinClusterLayerProps,
  PinClusterLayerState,
  PinClusterPickingInfo,
} from "./types";

const DEFAULT_VISITED_COLOR: ColorRGBA = [242, 77, 89, 255];
const DEFAULT_UNVISITED_COLOR: ColorRGBA = [255, 115, 64, 255];
const DEFAULT_UNVISITED_PIN_COLOR: ColorRGBA = [142, 142, 147, 255];
const DEFAULT_SELECTED_COLOR: ColorRGBA = [255, 140, 0, 255];
const DEFAULT_OUTLINE_COLOR: ColorRGBA = [255, 255, 255, 255];
const DEFAULT_TEXT_COLOR: ColorRGBA = [255, 255, 255, 255];

const defaultProps: DefaultProps<PinClusterLayerProps> = {
  geometryColumn: "geometry",
  idColumn: "id",
  visitedColumn: "visited",
  cutoffZoom: { type: "number", value: 16 },
  createClusterId: { type: "function", value: () => crypto.randomUUID() },
  visitedColor: { type: "color", value: DEFAULT_VISITED_COLOR },
  unvisitedColor: { type: "color", value: DEFAULT_UNVISITED_COLOR },
  unvisitedPinColor: { type: "color", value: DEFAULT_UNVISITED_PIN_COLOR },
  selectedColor: { type: "color", value: DEFAULT_SELECTED_COLOR },
  outlineColor: { type: "color", value: DEFAULT_OUTLINE_COLOR },
  textColor: { type: "color", value: DEFAULT_TEXT_COLOR },
  selectedItemId: null,
  // Treat the same Arrow Table reference as unchanged data; deck.gl would
  // otherwise flag dataChanged on every new layer instance.
  dataComparator: {
    type: "function",
    value: (newData: unknown, oldData: unknown) => newData === oldData,
  },
};

export class PinClusterLayer extends CompositeLayer<PinClusterLayerProps> {
  static layerName = "PinClusterLayer";
  static defaultProps = defaultProps;

  declare state: PinClusterLayerState;

  /**
   * The default CompositeLayer implementation ignores viewport changes; the
   * grouping depends on the visible width, so respond to them too.
   */
  shouldUpdateState({
    changeFlags,
  }: UpdateParameters<PinClusterLayer>): boolean {
    return changeFlags.somethingChanged;
  }

  initializeState(): void {
    this.state = {
      engine: null,
      pins: [],
      items: [],
      lastRadius: undefined,
    };
  }

  updateState(params: UpdateParameters<PinClusterLayer>): void {
    const { props, oldProps, changeFlags } = params;

    let engineChanged = false;
    let pinsChanged = false;

    if (
      !this.state.engine ||
      props.cutoffZoom !== oldProps.cutoffZoom ||
      props.createClusterId !== oldProps.createClusterId
    ) {
      this.setState({
        engine: new PinClusterEngine({
          cutoffZoom: props.cutoffZoom,
          createId: props.createClusterId,
        }),
      });
      engineChanged = true;
    }

    const dataActuallyChanged =
      changeFlags.dataChanged && props.data !== oldProps.data;
    if (
      dataActuallyChanged ||
      props.geometryColumn !== oldProps.geometryColumn ||
      props.idColumn !== oldProps.idColumn ||
      props.visitedColumn !== oldProps.visitedColumn
    ) {
      this._loadPins(props);
      pinsChanged = true;
    }

    // Recluster only when the radius for the current view differs from the
    // last pass; panning and sub-tier zooming leave the grouping unchanged.
    const { engine } = this.state;
    const viewport = viewportFromBounds(this.context.viewport.getBounds());
    const radius = engine ? engine.resolveRadius(viewport) : null;
    if (engineChanged || pinsChanged || radius !== this.state.lastRadius) {
      this.setState({
        items: engine ? engine.cluster(this.state.pins, viewport) : [],
        lastRadius: radius,
      });
    }
  }

  renderLayers() {
    const { items } = this.state;
    if (items.length === 0) return [];

    const {
      visitedColor,
      unvisitedColor,
      unvisitedPinColor,
      selectedColor,
      outlineColor,
      textColor,
      selectedItemId,
    } = this.props;

    const positions = computePositions(items);
    const fillColors = computeFillColors(items, selectedItemId, {
      visited: visitedColor!,
      unvisitedCluster: unvisitedColor!,
      unvisitedPin: unvisitedPinColor!,
      selected: selectedColor!,
    });
    const radii = computeRadii(items);
    const outlineWidths = computeOutlineWidths(items);
    const texts = computeTexts(items);
    const labelSizes = computeLabelSizes(items);

    const markerLayer = new ScatterplotLayer(
      this.getSubLayerProps({
        id: "markers",
        updateTriggers: {
          getFillColor: [
            visitedColor,
            unvisitedColor,
            unvisitedPinColor,
            selectedColor,
            selectedItemId,
          ],
        },
      }),
      {
        data: {
          length: items.length,
          attributes: {
            getPosition: { value: positions, size: 2 },
            getRadius: { value: radii, size: 1 },
            getFillColor: { value: fillColors, size: 4 },
            getLineWidth: { value: outlineWidths, size: 1 },
          },
        },
        radiusUnits: "pixels",
        lineWidthUnits: "pixels",
        stroked: true,
        filled: true,
        getLineColor: outlineColor,
        pickable: true,
      },
    );

    // Labels only for clusters
    const clusterIndices: number[] = [];
    for (let i = 0; i < items.length; i++) {
      if (items[i].kind === "cluster") clusterIndices.push(i);
    }

    const labelLayer = new TextLayer(
      this.getSubLayerProps({
        id: "labels",
        updateTriggers: {
          getColor: [textColor],
        },
      }),
      {
        data: clusterIndices,
        getPosition: (idx: number) => [
          positions[idx * 2],
          positions[idx * 2 + 1],
        ],
        getText: (idx: number) => texts[idx] ?? "",
        getSize: (idx: number) => labelSizes[idx],
        getColor: textColor,
        fontWeight: "bold",
        getTextAnchor: "middle",
        getAlignmentBaseline: "center",
        pickable: false,
      },
    );

    return [markerLayer, labelLayer];
  }

  getPickingInfo(params: GetPickingInfoParams): PinClusterPickingInfo {
    return resolvePickingInfo(params.info, this.state.items);
  }

  // --- Private helpers ---

  private _loadPins(props: PinClusterLayerProps): void {
    const table = props.data as Table;
    if (!table || table.numRows === 0) {
      this.setState({ pins: [] });
      return;
    }

    this.setState({
      pins: pinsFromTable(table, {
        geometryColumn: props.geometryColumn,
        idColumn: props.idColumn,
        visitedColumn: props.visitedColumn,
      }),
    });
  }
}
