/**
 * Flatness measurement with a dial indicator.
 *
 * A part with a measured top profile slides under a dial indicator. The
 * dial tracks the surface, its swept range is highlighted on a second
 * pass, and the low and high readings are subtracted to give the measured
 * flatness. Times below are in seconds.
 */

import type { ColorRGB, EntityAlias, Vec2, Vec3 } from "@linework/contracts";
import {
  DialIndicator,
  Logger,
  createDialIndicator,
  createLeader,
  createText,
  fadeIn,
  fadeOut,
  minZoneFlatness,
  pause,
  setAttr,
  setCmd,
  slide,
  slideTo,
  sweepAttr,
  sweepCmd,
  trackInstruction,
  type Scene,
  type SceneInstruction,
  type SceneNode,
} from "@linework/engine";
import { createProfileBlock } from "./profileBlock";

const log = Logger.create("FlatnessAnimation");

const ACCENT: ColorRGB = [230, 156, 0];
const WHITE: ColorRGB = [255, 255, 255];
const PART: ColorRGB = [130, 180, 250];

/** Plunger travel per full dial revolution, mm */
const READOUT_SCALE = 1;

export interface FlatnessReadings {
  /** Lowest profile height, mm */
  low: number;
  /** Highest profile height, mm */
  high: number;
  /** high - low, as a dial indicator measures it */
  measured: number;
  /** Minimum-zone flatness of the same profile */
  minimumZone: number;
}

export function flatnessReadings(profile: readonly Vec2[]): FlatnessReadings {
  const heights = profile.map(([, y]) => y);
  const low = Math.min(...heights);
  const high = Math.max(...heights);
  return { low, high, measured: high - low, minimumZone: minZoneFlatness(profile) };
}

function mm(value: number): string {
  return value.toFixed(2);
}

function onDial(
  alias: EntityAlias,
  label: string,
  action: (dial: DialIndicator) => void
): SceneInstruction {
  return {
    op: "custom",
    label: `${label}(${alias})`,
    apply: (ctx) => action(DialIndicator.from(ctx.entity(alias))),
  };
}

function createEntities(scene: Scene, profile: readonly Vec2[], readings: FlatnessReadings) {
  const graph = scene.graph;
  const text = (content: string, scale: number, size: number, position: Vec3, color: ColorRGB) =>
    createText(graph, content, scale, { size, position, color, opacity: 0 });
  const leader = (vertices: Vec3[], size: number, endArrow = false) =>
    createLeader(graph, vertices, { endArrow }, { color: ACCENT, size });

  const dial = createDialIndicator(
    graph,
    { diameter: 1.25, readoutScale: READOUT_SCALE },
    { opacity: 0, position: [0, 1.103, 0] }
  );
  const poly = createProfileBlock(graph, profile, {}, { color: PART, opacity: 0, position: [-3, -1.8, 0] });

  const entities: Record<EntityAlias, SceneNode> = {
    dial,
    poly,
    titleText1: text("FLATNESS MEASUREMENT", 0.01, 3, [-1.97, 0.8, 0], WHITE),
    titleText2: text("WITH DIAL INDICATOR", 0.01, 3, [-1.61, 0.4, 0], WHITE),
    flatLoLeader: leader(
      [
        [0, 0.213, 0],
        [0.4818, 1.0893, 0],
        [0.6818, 1.0893, 0],
      ],
      2
    ),
    flatHiLeader: leader(
      [
        [0, 0.213, 0],
        [-0.1253, -0.7791, 0],
        [-0.3253, -0.7791, 0],
      ],
      2
    ),
    flatLoText: text(mm(readings.low), 0.005, 2, [0.75, 1.04, 0], ACCENT),
    flatHiText: text(mm(readings.high), 0.005, 2, [-0.74, -0.83, 0], ACCENT),
    measFlatText: text("MEASURED FLATNESS", 0.005, 2, [-2.95, -0.7, 0], WHITE),
    minusText: text("-", 0.005, 2, [-2.55, -0.9, 0], ACCENT),
    equalsText: text("=", 0.005, 2, [-1.95, -0.9, 0], ACCENT),
    flatDimText: text(mm(readings.measured), 0.005, 2, [-1.75, -0.9, 0], ACCENT),
    mmText: text("mm", 0.005, 2, [-1.35, -0.9, 0], ACCENT),
    topDimArrow: leader(
      [
        [-3.0, -0.85, 0],
        [-3.2, -0.85, 0],
        [-3.2, -1.275, 0],
      ],
      1,
      true
    ),
    bottomDimArrow: leader(
      [
        [-3.2, -2.0, 0],
        [-3.2, -1.72, 0],
      ],
      1,
      true
    ),
    topDimLine: leader(
      [
        [-3.3, -1.275, 0],
        [3.3, -1.275, 0],
      ],
      1
    ),
    bottomDimLine: leader(
      [
        [-3.3, -1.72, 0],
        [3.3, -1.72, 0],
      ],
      1
    ),
  };
  scene.registerAll(entities);
}

/**
 * Registers the entities of the flatness animation on `scene` and writes
 * its script. Returns the readings shown on screen.
 */
export function buildFlatnessAnimation(scene: Scene, profile: readonly Vec2[]): FlatnessReadings {
  const readings = flatnessReadings(profile);
  log.info(
    `Profile of ${profile.length} points: measured ${mm(readings.measured)} mm, ` +
      `minimum zone ${readings.minimumZone.toFixed(3)} mm`
  );
  createEntities(scene, profile, readings);

  // Opening on black
  pause(scene, 1.5);

  // Title and part
  fadeIn(scene, 1.5, "titleText1", { tStart: 1.5 });
  fadeIn(scene, 1.5, "titleText2", { tStart: 1.5 });
  fadeIn(scene, 1.5, "poly", { tStart: 1.5 });
  fadeOut(scene, 1.0, "titleText1", { tStart: 5.5 });
  fadeOut(scene, 1.0, "titleText2", { tStart: 5.5 });

  // Dial comes in and is lowered onto the part
  fadeIn(scene, 1.5, "dial", { tStart: 7.0 });
  slide(scene, 2.5, "poly", [-2.97, 0, 0], { tStart: 9.5 });
  sweepCmd(scene, 43.0, trackInstruction("dial", "poly"), { tStart: 12.0 });
  slide(scene, 2.0, "dial", [0, -0.89, 0], { profile: "sinusoid", tStart: 12 });

  // First pass and return
  slide(scene, 10.0, "poly", [5.94, 0, 0], { profile: "linear", tStart: 15.0 });
  slide(scene, 2.0, "poly", [-5.94, 0, 0], { tStart: 26.5 });

  // Second pass with the swept range highlighted
  setCmd(scene, onDial("dial", "resetHighlight", (dial) => dial.resetHighlight()), { tStart: 29.5 });
  setCmd(scene, onDial("dial", "showHighlight", (dial) => dial.displayHighlight(true)), { tStart: 29.5 });
  slide(scene, 15.0, "poly", [5.94, 0, 0], { profile: "linear", tStart: 30.0 });

  // Low and high readings called out
  sweepAttr(scene, 0.5, "flatLoLeader", "extension", 0, 1, { profile: "sinusoid", tStart: 46.0 });
  fadeIn(scene, 0.5, "flatLoText", { tStart: 46.5 });
  sweepAttr(scene, 0.5, "flatHiLeader", "extension", 0, 1, { profile: "sinusoid", tStart: 48.0 });
  fadeIn(scene, 0.5, "flatHiText", { tStart: 48.5 });

  setCmd(scene, onDial("dial", "resetHighlight", (dial) => dial.resetHighlight()), { tStart: 50.5 });
  setCmd(scene, onDial("dial", "hideHighlight", (dial) => dial.displayHighlight(false)), { tStart: 50.5 });
  fadeOut(scene, 1.0, "flatHiLeader", { profile: "linear", tStart: 51.0 });
  fadeOut(scene, 1.0, "flatLoLeader", { profile: "linear", tStart: 51.0 });

  // Dial leaves; readings move into the subtraction
  slide(scene, 1.0, "dial", [0, 4, 0], { profile: "quadratic", tStart: 52.0 });
  setAttr(scene, "dial", "opacity", 0, { tStart: 53.0 });
  slideTo(scene, 1.0, "flatHiText", [-2.95, -0.9, 0], { tStart: 53.0 });
  slideTo(scene, 1.0, "flatLoText", [-2.35, -0.9, 0], { tStart: 53.0 });

  fadeIn(scene, 0.5, "measFlatText", { tStart: 54.0 });
  fadeIn(scene, 0.5, "minusText", { tStart: 54.0 });
  fadeIn(scene, 0.5, "equalsText", { tStart: 55.5 });
  fadeIn(scene, 0.5, "flatDimText", { tStart: 55.5 });
  fadeIn(scene, 0.5, "mmText", { tStart: 56.0 });

  fadeOut(scene, 1.0, "minusText", { tStart: 57.5 });
  fadeOut(scene, 1.0, "equalsText", { tStart: 57.5 });
  fadeOut(scene, 1.0, "flatLoText", { tStart: 57.5 });
  fadeOut(scene, 1.0, "flatHiText", { tStart: 57.5 });

  slideTo(scene, 1.0, "flatDimText", [-2.95, -0.9, 0], { tStart: 58.0 });
  slideTo(scene, 1.0, "mmText", [-2.55, -0.9, 0], { tStart: 58.0 });

  // Part recentres and is dimensioned
  slide(scene, 2.0, "poly", [-2.97, 0, 0], { tStart: 59.0 });
  sweepAttr(scene, 0.5, "topDimArrow", "extension", 0, 1, { profile: "sinusoid", tStart: 61.0 });
  sweepAttr(scene, 0.5, "bottomDimArrow", "extension", 0, 1, { profile: "sinusoid", tStart: 61.0 });
  sweepAttr(scene, 0.5, "topDimLine", "extension", 0, 1, { profile: "sinusoid", tStart: 61.5 });
  sweepAttr(scene, 0.5, "bottomDimLine", "extension", 0, 1, { profile: "sinusoid", tStart: 61.5 });

  // Fade to black
  for (const alias of ["topDimArrow", "bottomDimArrow", "topDimLine", "bottomDimLine"]) {
    fadeOut(scene, 0.5, alias, { tStart: 65.0 });
  }
  for (const alias of ["measFlatText", "mmText", "flatDimText"]) {
    fadeOut(scene, 0.5, alias, { tStart: 65.5 });
  }
  fadeOut(scene, 0.5, "poly", { tStart: 66.0 });
  pause(scene, 1.5);

  return readings;
}
