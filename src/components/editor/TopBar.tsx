import React, { useCallback } from 'react';
import { useEditor } from '@/contexts/EditorContext';
import { ScanLine } from 'lucide-react';
import { cn } from '@/lib/utils';

export function TopBar() {
  const { state, jumpTo, setFilenameDraft } = useEditor();
  const { view, filenames, filenameDraft, isProcessing } = state;

  const handleSubmit = useCallback((e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    void jumpTo(filenameDraft);
  }, [jumpTo, filenameDraft]);

  const hasMask = view?.status === 'has-mask';

  return (
    <div className="h-14 border-b border-neutral-800 bg-neutral-900 flex items-center px-4 gap-4">
      {/* Logo */}
      <div className="flex items-center gap-2 mr-2">
        <div className="w-8 h-8 rounded-lg bg-sky-500 flex items-center justify-center">
          <ScanLine size={18} className="text-neutral-950" />
        </div>
        <span className="font-semibold text-sm">Scribble Editor</span>
      </div>

      {/* Filename: Enter jumps to the typed image */}
      <form className="flex items-center gap-2 flex-1 max-w-xl" onSubmit={handleSubmit}>
        <label htmlFor="image-name" className="text-xs text-neutral-400">Image</label>
        <input
          id="image-name"
          list="image-names"
          value={filenameDraft}
          onChange={(e) => setFilenameDraft(e.target.value)}
          disabled={isProcessing || !view}
          spellCheck={false}
          className="flex-1 rounded-md border border-neutral-700 bg-neutral-950 px-2 py-1 text-sm font-mono focus:outline-none focus:ring-2 focus:ring-sky-500/50"
        />
        <datalist id="image-names">
          {filenames.map(name => <option key={name} value={name} />)}
        </datalist>
      </form>

      {/* Scribble status */}
      <div className="flex items-center gap-2 text-sm" aria-label="Scribble Status">
        <span className={cn('w-2.5 h-2.5 rounded-full', hasMask ? 'bg-emerald-500' : 'bg-rose-500')} />
        {view ? (hasMask ? 'Scribble exists' : 'No scribble yet') : '—'}
      </div>

      <div className="flex-1" />

      {view && (
        <div className="text-xs text-neutral-400 tabular-nums">
          {view.index + 1} / {view.total} · {view.width} × {view.height}
        </div>
      )}
    </div>
  );
}
