import React from 'react';
import { useEditor } from '@/contexts/EditorContext';
import { BRUSH_COLORS, MAX_BRUSH_SIZE, MIN_BRUSH_SIZE } from '@/lib/canvas/constants';
import { Paintbrush, Trash2 } from 'lucide-react';
import { cn } from '@/lib/utils';

interface ColorButtonProps {
  color: string;
  shortcut: string;
  isActive: boolean;
  onClick: () => void;
}

function ColorButton({ color, shortcut, isActive, onClick }: ColorButtonProps) {
  return (
    <button
      className={cn(
        'w-8 h-8 rounded-md border-2 border-neutral-700 transition-shadow',
        isActive && 'border-sky-400 ring-2 ring-sky-400/40'
      )}
      style={{ backgroundColor: color }}
      title={`Brush ${color} (${shortcut})`}
      aria-pressed={isActive}
      onClick={onClick}
    />
  );
}

export function Toolbar() {
  const { state, setBrushColor, setBrushSize, clearStrokes } = useEditor();
  const { brush, layers } = state;

  const handleSizeChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    setBrushSize(Number(e.target.value));
  };

  return (
    <div className="flex items-center gap-3 rounded-lg border border-neutral-800 bg-neutral-900 px-3 py-2">
      <Paintbrush size={16} className="text-neutral-400" />

      {BRUSH_COLORS.map((color, index) => (
        <ColorButton
          key={color}
          color={color}
          shortcut={String(index + 1)}
          isActive={brush.color === color}
          onClick={() => setBrushColor(color)}
        />
      ))}

      <label className="ml-2 flex items-center gap-2 text-xs text-neutral-400">
        Size
        <input
          type="range"
          min={MIN_BRUSH_SIZE}
          max={MAX_BRUSH_SIZE}
          value={brush.size}
          onChange={handleSizeChange}
          className="w-32 accent-sky-400"
        />
        <span className="w-8 tabular-nums text-neutral-300">{brush.size}</span>
      </label>

      <div className="flex-1" />

      <span className="text-xs text-neutral-500">
        {layers.length === 0 ? 'No strokes' : `${layers.length} strokes`}
      </span>
      <button
        className="flex items-center gap-1 rounded-md px-2 py-1 text-xs text-neutral-300 hover:bg-neutral-800 disabled:opacity-30 disabled:cursor-not-allowed"
        onClick={clearStrokes}
        disabled={layers.length === 0}
      >
        <Trash2 size={14} />
        Clear strokes
      </button>
    </div>
  );
}
