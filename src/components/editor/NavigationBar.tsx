import { useEditor } from '@/contexts/EditorContext';
import { ArrowLeft, ArrowRight, Save, Loader2 } from 'lucide-react';

export function NavigationBar() {
  const { state, goPrevious, goNext, save } = useEditor();
  const { view, isProcessing } = state;

  const atStart = !view || view.index === 0;
  const atEnd = !view || view.index === view.total - 1;

  const buttonClass =
    'flex-1 flex items-center justify-center gap-2 rounded-md border border-neutral-700 bg-neutral-900 py-2 text-sm hover:bg-neutral-800 disabled:opacity-30 disabled:cursor-not-allowed';

  return (
    <div className="flex gap-2">
      <button className={buttonClass} onClick={() => void goPrevious()} disabled={isProcessing || atStart} title="Previous image (←)">
        <ArrowLeft size={16} />
      </button>
      <button className={buttonClass} onClick={() => void goNext()} disabled={isProcessing || atEnd} title="Next image (→)">
        <ArrowRight size={16} />
      </button>
      <button
        className={`${buttonClass} bg-sky-600 border-sky-500 hover:bg-sky-500 text-white`}
        onClick={() => void save()}
        disabled={isProcessing || !view}
        title="Save scribbles (Ctrl+S)"
      >
        {isProcessing ? <Loader2 size={16} className="animate-spin" /> : <Save size={16} />}
        Save Scribbles
      </button>
    </div>
  );
}
