import type { Shape, StrokeStyle } from "../types/graph";

export type PaintTarget = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "quadraticCurveTo"
  | "bezierCurveTo"
  | "arc"
  | "fill"
  | "stroke"
  | "fillText"
  | "clearRect"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "lineCap"
  | "lineJoin"
  | "font"
  | "textAlign"
  | "textBaseline"
>;

function applyStroke(ctx: PaintTarget, stroke: StrokeStyle) {
  ctx.strokeStyle = stroke.color;
  ctx.lineWidth = stroke.width;
  ctx.lineCap = "round";
  ctx.lineJoin = "round";
}

function paintShape(ctx: PaintTarget, shape: Shape) {
  ctx.save();
  ctx.beginPath();

  switch (shape.kind) {
    case "circle":
      ctx.arc(shape.center.x, shape.center.y, shape.radius, 0, Math.PI * 2);
      ctx.fillStyle = shape.fill;
      ctx.fill();
      if (shape.stroke) {
        applyStroke(ctx, shape.stroke);
        ctx.stroke();
      }
      break;
    case "line":
      applyStroke(ctx, shape.stroke);
      ctx.moveTo(shape.from.x, shape.from.y);
      ctx.lineTo(shape.to.x, shape.to.y);
      ctx.stroke();
      break;
    case "quadratic":
      applyStroke(ctx, shape.stroke);
      ctx.moveTo(shape.from.x, shape.from.y);
      ctx.quadraticCurveTo(
        shape.control.x,
        shape.control.y,
        shape.to.x,
        shape.to.y,
      );
      ctx.stroke();
      break;
    case "cubic":
      applyStroke(ctx, shape.stroke);
      ctx.moveTo(shape.from.x, shape.from.y);
      ctx.bezierCurveTo(
        shape.control1.x,
        shape.control1.y,
        shape.control2.x,
        shape.control2.y,
        shape.to.x,
        shape.to.y,
      );
      ctx.stroke();
      break;
    case "text":
      ctx.fillStyle = shape.color;
      ctx.font = `${shape.size}px sans-serif`;
      ctx.textAlign = "center";
      ctx.textBaseline = "middle";
      ctx.fillText(shape.text, shape.position.x, shape.position.y);
      break;
  }

  ctx.restore();
}

/** Clears the surface and paints shapes in list order. */
export function paintShapes(
  ctx: PaintTarget,
  shapes: Shape[],
  width: number,
  height: number,
): void {
  ctx.clearRect(0, 0, width, height);
  shapes.forEach((shape) => paintShape(ctx, shape));
}
