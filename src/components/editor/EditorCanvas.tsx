import React, { useRef, useEffect, useCallback } from 'react';
import { useEditor } from '@/contexts/EditorContext';
import { screenToImage } from '@/lib/canvas/coordinateSystem';
import { parseHexColor } from '@/lib/canvas/imageUtils';
import { hardenStroke } from '@/lib/canvas/layerUtils';
import { canvasToRgbaImage, cleanupLayerCache, getCachedLayerCanvas } from '@/lib/canvas/renderCache';
import { EDITOR_HEIGHT } from '@/lib/canvas/constants';
import type { Point } from '@/lib/canvas/types';

/**
 * Paint surface: the current image with the session's strokes on top.
 * Every pointer stroke becomes one layer the size of the image.
 */
export function EditorCanvas() {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const strokeCanvasRef = useRef<HTMLCanvasElement | null>(null);
  const lastPointRef = useRef<Point | null>(null);
  const { state, addStroke } = useEditor();
  const { view, layers, brush } = state;

  const redraw = useCallback(() => {
    const canvas = canvasRef.current;
    const ctx = canvas?.getContext('2d');
    if (!canvas || !ctx) return;

    ctx.clearRect(0, 0, canvas.width, canvas.height);

    for (const layer of layers) {
      ctx.drawImage(getCachedLayerCanvas(layer), 0, 0);
    }

    if (strokeCanvasRef.current) {
      ctx.drawImage(strokeCanvasRef.current, 0, 0);
    }
  }, [layers]);

  useEffect(() => {
    redraw();
  }, [redraw, view?.width, view?.height]);

  // Cleanup cached layer canvases when layers change
  useEffect(() => {
    cleanupLayerCache(new Set(layers.map(l => l.id)));
  }, [layers]);

  const toImagePoint = (e: React.PointerEvent<HTMLCanvasElement>): Point | null => {
    if (!view) return null;
    const rect = e.currentTarget.getBoundingClientRect();
    return screenToImage(e.clientX, e.clientY, rect, view.width, view.height);
  };

  const handlePointerDown = (e: React.PointerEvent<HTMLCanvasElement>) => {
    const point = toImagePoint(e);
    if (!view || !point || e.button !== 0) return;

    e.currentTarget.setPointerCapture(e.pointerId);

    const strokeCanvas = document.createElement('canvas');
    strokeCanvas.width = view.width;
    strokeCanvas.height = view.height;
    const ctx = strokeCanvas.getContext('2d');
    if (!ctx) return;

    ctx.strokeStyle = brush.color;
    ctx.fillStyle = brush.color;
    ctx.lineWidth = brush.size;
    ctx.lineCap = 'round';
    ctx.lineJoin = 'round';

    // Single click leaves a dot
    ctx.beginPath();
    ctx.arc(point.x, point.y, brush.size / 2, 0, Math.PI * 2);
    ctx.fill();

    strokeCanvasRef.current = strokeCanvas;
    lastPointRef.current = point;
    redraw();
  };

  const handlePointerMove = (e: React.PointerEvent<HTMLCanvasElement>) => {
    const ctx = strokeCanvasRef.current?.getContext('2d');
    const last = lastPointRef.current;
    const point = toImagePoint(e);
    if (!ctx || !last || !point) return;

    ctx.beginPath();
    ctx.moveTo(last.x, last.y);
    ctx.lineTo(point.x, point.y);
    ctx.stroke();

    lastPointRef.current = point;
    redraw();
  };

  const finishStroke = () => {
    const strokeCanvas = strokeCanvasRef.current;
    strokeCanvasRef.current = null;
    lastPointRef.current = null;
    if (!strokeCanvas) return;

    addStroke(hardenStroke(canvasToRgbaImage(strokeCanvas), parseHexColor(brush.color)));
  };

  if (!view) {
    return (
      <div
        className="flex-1 flex items-center justify-center rounded-lg border border-neutral-800 text-sm text-neutral-500"
        style={{ height: EDITOR_HEIGHT }}
      >
        Loading image…
      </div>
    );
  }

  return (
    <div className="flex-1 min-w-0 flex flex-col gap-2">
      <span className="text-xs font-medium uppercase tracking-wide text-neutral-400">Draw Scribbles</span>
      <div
        className="flex items-center justify-center overflow-hidden rounded-lg border border-neutral-800 bg-neutral-900"
        style={{ height: EDITOR_HEIGHT }}
      >
        <div className="relative max-h-full max-w-full">
          <img
            src={view.image}
            alt={view.filename}
            draggable={false}
            className="block max-w-full select-none"
            style={{ maxHeight: EDITOR_HEIGHT }}
          />
          <canvas
            ref={canvasRef}
            width={view.width}
            height={view.height}
            className="absolute inset-0 h-full w-full cursor-crosshair touch-none"
            onPointerDown={handlePointerDown}
            onPointerMove={handlePointerMove}
            onPointerUp={finishStroke}
            onPointerCancel={finishStroke}
          />
        </div>
      </div>
    </div>
  );
}
