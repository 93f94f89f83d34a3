import { useEditor } from '@/contexts/EditorContext';
import { EDITOR_HEIGHT } from '@/lib/canvas/constants';

export function OverlayPreview() {
  const { state } = useEditor();
  const { view } = state;

  return (
    <div className="flex-1 min-w-0 flex flex-col gap-2">
      <span className="text-xs font-medium uppercase tracking-wide text-neutral-400">
        Overlay: Image + Scribble
      </span>
      <div
        className="flex items-center justify-center overflow-hidden rounded-lg border border-neutral-800 bg-neutral-900"
        style={{ height: EDITOR_HEIGHT }}
      >
        {view && (
          <img
            src={view.overlay}
            alt={`${view.filename} overlay`}
            draggable={false}
            className="block max-w-full select-none"
            style={{ maxHeight: EDITOR_HEIGHT }}
          />
        )}
      </div>
    </div>
  );
}
