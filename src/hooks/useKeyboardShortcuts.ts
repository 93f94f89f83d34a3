import { useEffect, useCallback } from 'react';
import { useEditor } from '@/contexts/EditorContext';
import { BRUSH_COLORS } from '@/lib/canvas/constants';

/**
 * Hook for keyboard shortcuts
 */
export function useKeyboardShortcuts() {
  const {
    goNext,
    goPrevious,
    save,
    setBrushColor,
  } = useEditor();

  const handleKeyDown = useCallback((e: KeyboardEvent) => {
    const isCmd = e.metaKey || e.ctrlKey;

    // Save works everywhere, including the filename field
    if (isCmd && e.key.toLowerCase() === 's') {
      e.preventDefault();
      void save();
      return;
    }

    // Ignore if typing in input
    if (e.target instanceof HTMLInputElement || e.target instanceof HTMLTextAreaElement) {
      return;
    }

    if (isCmd || e.altKey) return;

    switch (e.key) {
      case 'ArrowLeft':
        e.preventDefault();
        void goPrevious();
        break;
      case 'ArrowRight':
        e.preventDefault();
        void goNext();
        break;
      case '1':
      case '2': {
        const color = BRUSH_COLORS[Number(e.key) - 1];
        setBrushColor(color);
        break;
      }
    }
  }, [goNext, goPrevious, save, setBrushColor]);

  useEffect(() => {
    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, [handleKeyDown]);
}
