import { useEditor } from '@/contexts/EditorContext';

function ReadOnlyField({ label, value, mono }: { label: string; value: string; mono?: boolean }) {
  return (
    <label className="flex flex-col gap-1 text-xs text-neutral-400">
      {label}
      <input
        readOnly
        value={value}
        className={`rounded-md border border-neutral-800 bg-neutral-900 px-2 py-1 text-sm text-neutral-200 ${mono ? 'font-mono' : ''}`}
      />
    </label>
  );
}

export function StatusPanel() {
  const { state } = useEditor();
  const { view, statusMessage } = state;

  return (
    <div className="flex flex-col gap-3">
      <ReadOnlyField label="Status" value={statusMessage} />
      <ReadOnlyField label="Project Path" value={view?.projectPath ?? ''} mono />
      <div className="grid grid-cols-2 gap-3">
        <ReadOnlyField label="Total Images" value={view ? String(view.total) : ''} />
        <ReadOnlyField label="Scribble Images" value={view ? String(view.maskCount) : ''} />
      </div>
    </div>
  );
}
